// ヘッダーから得た再生時間を0以上の整数秒にする
export function normalizeDurationSeconds(duration: number | undefined): number {
  if (duration === undefined || !Number.isFinite(duration)) {
    return 0;
  }
  return Math.max(Math.round(duration), 0);
}

// 再生時間を HH:MM:SS 形式の文字列に変換
export function formatDuration(seconds: number): string {
  if (seconds <= 0) {
    return '00:00:00';
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);
  return [hours, minutes, secs].map((value) => value.toString().padStart(2, '0')).join(':');
}

// ミリ秒の長さを HH:MM:SS に変換（itunes:duration用）
export function formatDurationMillis(milliseconds: number): string {
  return formatDuration(Math.floor(Math.max(milliseconds, 0) / 1000));
}
