/**
 * Chat Relay — dotenv 分层加载器
 *
 * 加载优先级（后加载的覆盖先加载的）：
 *   1. .env（团队共享默认值）
 *   2. .env.development / .env.production（按 NODE_ENV 选择）
 *   3. .env.local（个人覆盖，不提交到 Git）
 * 已存在于进程中的环境变量始终优先（包括命令行 PORT=3001 npm start）。
 *
 * 注意：此文件必须在所有其他 import 之前执行（side-effect import）。
 */

import { parse } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

const ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '../../');

// 进程启动时就存在的变量，文件不得覆盖
const processKeys = new Set(Object.keys(process.env));

function loadIfExists(filePath: string): boolean {
  const fullPath = resolve(ROOT, filePath);
  if (!existsSync(fullPath)) return false;

  // 按从低到高的顺序加载并覆盖之前文件中的值，但保留进程原有变量
  const parsed = parse(readFileSync(fullPath));
  for (const [key, value] of Object.entries(parsed)) {
    if (!processKeys.has(key)) process.env[key] = value;
  }
  return true;
}

const nodeEnv = process.env.NODE_ENV || 'development';
const loaded: string[] = [];

for (const file of ['.env', `.env.${nodeEnv}`, '.env.local']) {
  if (loadIfExists(file)) loaded.push(file);
}

// 使用 console 而非 logger（logger 尚未按配置初始化）
if (loaded.length > 0 && process.env.LOG_LEVEL === 'debug') {
  console.debug(`[env-loader] Loaded config files: ${loaded.join(' → ')}`);
}

export { loaded as loadedEnvFiles };
