// 型定義
export type {
  RGS,
  Block,
  BlockRange,
  EnumerationModeName,
  EnumerationMode,
  PartitionCursor,
  NodeKind,
  EdgeTerm,
  StirlingNode,
  StirlingNodeView,
  StirlingEdge,
  StirlingTree,
  TraceOrder,
  TraceEvent,
  StepperState,
} from './types.js'

// エラー
export { InvalidRequestError } from './errors.js'

// 設定・ログ
export type { CoreConfig } from './config.js'
export {
  loadConfig,
  getConfig,
  DEFAULT_MAX_TREE_NODES,
  DEFAULT_LAYOUT_Y_STEP,
} from './config.js'
export type { Logger, LogLevel } from './log.js'
export { createLogger } from './log.js'

// 要求の検証
export type { EnumerationRequest, TreeRequest } from './validation.js'
export { MODE_NAMES, parseEnumerationRequest, parseTreeRequest } from './validation.js'

// スターリング数・ベル数
export {
  stirling2,
  bell,
  countInRange,
  treeSize,
  isBaseCase,
  baseValue,
} from './stirling.js'

// 列挙モード
export { getMode } from './modes.js'

// RGS
export {
  successor,
  predecessor,
  fillMin,
  fillMax,
  isRGS,
  blockCount,
  blocksOf,
  blockSizes,
  formatBlocks,
} from './rgs.js'

// 列挙カーソル
export {
  first,
  last,
  next,
  previous,
  count,
  enumeratePartitions,
  enumerateBlocks,
} from './enumerator.js'

// 再帰木
export type { BuildTreeOptions, NodeSummary, NodeInfo } from './recurrence-tree.js'
export {
  buildTree,
  resolveValues,
  isResolved,
  trace,
  getNode,
  getRoot,
  describeNode,
  nodeLabel,
  edgeLabel,
  formatRecurrence,
} from './recurrence-tree.js'

// ステップ実行
export { TraceStepper } from './trace-stepper.js'

// 配置
export type { Point, LayoutOptions } from './tree-layout.js'
export { layoutTree } from './tree-layout.js'
