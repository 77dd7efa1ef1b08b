// ===== 基本型 =====

/**
 * 制限成長列（Restricted Growth String）
 * 要素 i+1 が属するブロック番号を a[i] に持つ。
 */
export type RGS = readonly number[]

/** ブロック（1始まりの要素番号、昇順） */
export type Block = number[]

/** ブロック数の許容範囲 [min, max]（両端含む） */
export interface BlockRange {
  min: number
  max: number
}

// ===== 列挙 (Enumeration) =====

/** 列挙モード名 */
export type EnumerationModeName = 'all' | 'exact-k'

/** 列挙モード（ブロック数の範囲だけを後続処理に渡す） */
export interface EnumerationMode {
  readonly name: EnumerationModeName
  /**
   * 要求 (n, k) に対するブロック数の範囲を返す。
   * 要求が不正な場合は InvalidRequestError を投げる。
   */
  blockRange(n: number, k: number | undefined): BlockRange
}

/** 列挙カーソル（next / previous で in-place に更新される） */
export interface PartitionCursor {
  readonly n: number
  readonly mode: EnumerationModeName
  /** exact-k のときのみ */
  readonly k: number | null
  readonly range: BlockRange
  /** 現在のRGS */
  readonly rgs: number[]
  /** restriction[i] = a[0..i-1] で開かれたブロック数 */
  readonly restriction: number[]
  /** 列挙順での0始まりの位置 */
  rank: number
  /** 直前の next が末尾に到達した */
  exhausted: boolean
}

// ===== 漸化式木 (Recurrence Tree) =====

/** ノードの種別 */
export type NodeKind = 'base' | 'recursive'

/** 辺の項: k·S(n-1,k) か S(n-1,k-1) か */
export type EdgeTerm = 'k-times' | 'minus-one'

/** 木のノード（アリーナ内、idは前順） */
export interface StirlingNode {
  id: number
  n: number
  k: number
  depth: number
  kind: NodeKind
  /** 未解決なら null */
  value: number | null
  /** base は空、recursive は [k-times側, minus-one側] */
  children: number[]
  parent: number | null
  /** このノードを導入した辺（根は null） */
  edge: number | null
}

/** 木の外に渡すノード（読み取り専用） */
export type StirlingNodeView = Readonly<Omit<StirlingNode, 'children'>> & {
  readonly children: readonly number[]
}

/** 木の辺 */
export interface StirlingEdge {
  id: number
  parent: number
  child: number
  term: EdgeTerm
}

/** S(n,k) の再帰木（共有なし） */
export interface StirlingTree {
  readonly n: number
  readonly k: number
  readonly nodes: StirlingNode[]
  readonly edges: StirlingEdge[]
  /** 後順評価済みか */
  resolved: boolean
}

/** トレースの走査順 */
export type TraceOrder = 'dfs' | 'bfs'

/** ノード出現イベント */
export interface TraceEvent {
  /** 0始まりの出現順 */
  step: number
  node: StirlingNodeView
  edge: Readonly<StirlingEdge> | null
}

/** ステッパーの状態 */
export type StepperState = 'ready' | 'stepping' | 'done'
