// フィード生成中の致命的なエラー：リクエスト単位で500として返す

export class FeedSerializationError extends Error {
  constructor(message = 'RSSフィードのXML生成に失敗しました', options?: ErrorOptions) {
    super(message, options);
    this.name = 'FeedSerializationError';
  }
}

export class HashAlgorithmUnavailableError extends Error {
  constructor(algorithm: string, options?: ErrorOptions) {
    super(`ハッシュアルゴリズム ${algorithm} が利用できません`, options);
    this.name = 'HashAlgorithmUnavailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
