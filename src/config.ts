import { z } from 'zod'
import { createLogger } from './log.js'

/** 木のノード数の既定上限 */
export const DEFAULT_MAX_TREE_NODES = 1_000_000

/** レイアウトの既定の縦間隔（下向き） */
export const DEFAULT_LAYOUT_Y_STEP = -1.3

const log = createLogger('config')

const envSchema = z.object({
  STIRLING_MAX_TREE_NODES: z.coerce.number().int().positive().default(DEFAULT_MAX_TREE_NODES),
})

export interface CoreConfig {
  /** buildTree が受け付ける最大ノード数 */
  maxTreeNodes: number
}

/**
 * 環境変数から設定を読む。
 * 不正な値は既定値にフォールバックし、warn を出す。
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): CoreConfig {
  const parsed = envSchema.safeParse({ STIRLING_MAX_TREE_NODES: env.STIRLING_MAX_TREE_NODES })
  if (!parsed.success) {
    log.warn(
      'STIRLING_MAX_TREE_NODES=%s は不正です。既定値 %d を使います',
      env.STIRLING_MAX_TREE_NODES,
      DEFAULT_MAX_TREE_NODES,
    )
    return { maxTreeNodes: DEFAULT_MAX_TREE_NODES }
  }
  return { maxTreeNodes: parsed.data.STIRLING_MAX_TREE_NODES }
}

let cached: CoreConfig | null = null

/** プロセス内で一度だけ読み込んだ設定 */
export function getConfig(): CoreConfig {
  if (cached === null) cached = loadConfig()
  return cached
}
