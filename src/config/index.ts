import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { configSchema, type Config } from './schema.js';

// 環境変数をオブジェクトにマッピング
function resolveEnvVariables(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    // ${ENV_VAR} 形式の環境変数を解決
    return obj.replace(/\$\{(\w+)\}/g, (_, envVar: string) => {
      return env[envVar] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVariables(item, env));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVariables(value, env);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// セクションが無ければ作成して返す
function section(config: Record<string, unknown>, name: string): Record<string, unknown> {
  const existing = config[name];
  if (isRecord(existing)) {
    return existing;
  }
  const created: Record<string, unknown> = {};
  config[name] = created;
  return created;
}

// 環境変数からのオーバーライド
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  if (env.PORT) {
    section(config, 'server').port = Number.parseInt(env.PORT, 10);
  }
  if (env.BASE_URL) {
    section(config, 'podcast').baseUrl = env.BASE_URL;
  }
  if (env.MEDIA_DIR) {
    section(config, 'media').dir = env.MEDIA_DIR;
  }
  if (env.IMAGES_DIR) {
    section(config, 'images').dir = env.IMAGES_DIR;
  }
  if (env.LOG_LEVEL) {
    section(config, 'logging').level = env.LOG_LEVEL.trim().toLowerCase();
  }
}

// 設定ファイルを読み込む
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  const defaultConfigPath = path.resolve(process.cwd(), 'config/default.yaml');
  const filePath = configPath ?? defaultConfigPath;

  let rawConfig: unknown = {};

  if (fs.existsSync(filePath)) {
    const content = fs.readFileSync(filePath, 'utf-8');
    rawConfig = parseYaml(content);
  }

  // 環境変数を解決
  const resolved = resolveEnvVariables(rawConfig, env);
  const config = isRecord(resolved) ? resolved : {};

  applyEnvOverrides(config, env);

  // バリデーションとデフォルト値の適用
  return configSchema.parse(config);
}

export { type Config, type PodcastConfig } from './schema.js';
export { resolveChannelSettings, type ChannelSettings } from './channel.js';
