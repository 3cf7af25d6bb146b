// 空白でなければtrimした値、そうでなければundefined
export function nonBlank(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// 拡張子を除いたファイル名。先頭のドットしかない名前はそのまま返す
export function stripExtension(filename: string): string {
  const dotIndex = filename.lastIndexOf('.');
  if (dotIndex <= 0) {
    return filename;
  }
  return filename.slice(0, dotIndex);
}

// 末尾のスラッシュを取り除く
export function trimTrailingSlashes(value: string): string {
  return value.trim().replace(/\/+$/, '');
}

// 大文字小文字を無視した比較（ロケールに依存しない）
export function compareIgnoreCase(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

// XML 1.0で使えない制御文字を除去（タブ・改行は残す）
export function stripInvalidXmlChars(value: string): string {
  return value.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '');
}
