import debug from 'debug'
import type { Debugger } from 'debug'

/** 名前空間の先頭 */
const ROOT = 'stirling-partitions'

export const LOG_LEVELS = ['info', 'warn', 'debug', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/** スコープごとのロガー（レベル別のdebugインスタンス） */
export type Logger = { [L in LogLevel]: Debugger }

/**
 * `stirling-partitions:<scope>:<level>` のロガーを作る。
 * 有効化は DEBUG 環境変数で行う（例: DEBUG=stirling-partitions:*）。
 */
export function createLogger(scope: string): Logger {
  const base = debug(`${ROOT}:${scope}`)
  return {
    info: base.extend('info'),
    warn: base.extend('warn'),
    debug: base.extend('debug'),
    error: base.extend('error'),
  }
}
