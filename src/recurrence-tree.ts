/**
 * S(n,k) の再帰木
 *
 * S(n,k) = k·S(n-1,k) + S(n-1,k-1) を素朴な再帰の通りに展開する。
 * 同じ (n,k) が何度現れても別ノードを作る（DAGにしない）ので、
 * アニメーションでは再計算の様子がそのまま見える。
 *
 * ノードはアリーナ（フラットな配列）に前順で並ぶ。
 * 子のidは常に親より大きいので、idの逆順に回せば後順評価になる。
 */

import { getConfig } from './config.js'
import { InvalidRequestError } from './errors.js'
import { createLogger } from './log.js'
import { baseValue, isBaseCase, stirling2, treeSize } from './stirling.js'
import { FifoQueue } from './utils/fifo-queue.js'
import { parseTreeRequest } from './validation.js'
import type {
  EdgeTerm,
  StirlingEdge,
  StirlingNode,
  StirlingNodeView,
  StirlingTree,
  TraceEvent,
  TraceOrder,
} from './types.js'

const log = createLogger('tree')

export interface BuildTreeOptions {
  /** 受け付ける最大ノード数（既定は設定値） */
  maxNodes?: number
}

/** 構築ワークリストの要素 */
interface PendingNode {
  n: number
  k: number
  depth: number
  parent: number | null
  term: EdgeTerm | null
}

/**
 * 共有なしの再帰木を構築する。
 * 値は未解決（base ノードのみ即値）。
 */
export function buildTree(n: number, k: number, options: BuildTreeOptions = {}): StirlingTree {
  const req = parseTreeRequest({ n, k })
  const maxNodes = options.maxNodes ?? getConfig().maxTreeNodes
  const size = treeSize(req.n, req.k)
  if (size > maxNodes) {
    const shown = Number.isFinite(size) ? `${size} ノード` : '2^53 ノード以上'
    throw new InvalidRequestError(
      `S(${req.n},${req.k}) の再帰木は ${shown}で、上限 ${maxNodes} を超えます`,
    )
  }
  // 各ノードの値は根の値以下なので、根が収まれば木全体が収まる
  stirling2(req.n, req.k)

  const nodes: StirlingNode[] = []
  const edges: StirlingEdge[] = []
  const stack: PendingNode[] = [{ n: req.n, k: req.k, depth: 0, parent: null, term: null }]

  while (stack.length > 0) {
    const pending = stack.pop()
    if (pending === undefined) break

    const id = nodes.length
    const base = isBaseCase(pending.n, pending.k)
    let edge: number | null = null

    if (pending.parent !== null && pending.term !== null) {
      edge = edges.length
      edges.push({ id: edge, parent: pending.parent, child: id, term: pending.term })
    }

    nodes.push({
      id,
      n: pending.n,
      k: pending.k,
      depth: pending.depth,
      kind: base ? 'base' : 'recursive',
      value: base ? baseValue(pending.n, pending.k) : null,
      children: [],
      parent: pending.parent,
      edge,
    })

    if (pending.parent !== null) {
      attachChild(nodes, pending.parent, id, pending.term)
    }

    if (!base) {
      // 前順で k-times 側が先に並ぶよう、minus-one 側を先に積む
      const depth = pending.depth + 1
      stack.push({ n: pending.n - 1, k: pending.k - 1, depth, parent: id, term: 'minus-one' })
      stack.push({ n: pending.n - 1, k: pending.k, depth, parent: id, term: 'k-times' })
    }
  }

  log.info('buildTree S(%d,%d): %d nodes', req.n, req.k, nodes.length)
  return { n: req.n, k: req.k, nodes, edges, resolved: false }
}

/** 親の children に子を追加（k-times 側は常に minus-one 側より先に来る） */
function attachChild(nodes: StirlingNode[], parentId: number, childId: number, term: EdgeTerm | null): void {
  const parent = nodes[parentId]
  if (parent === undefined) throw Error('親ノードが見つかりません: ' + parentId)
  if (term === 'k-times') {
    parent.children = [childId]
  } else {
    parent.children.push(childId)
  }
}

function nodeAt(tree: StirlingTree, id: number): StirlingNode {
  const node = tree.nodes[id]
  if (node === undefined) throw Error('無効なノードid: ' + id)
  return node
}

/** idでノードを取得 */
export function getNode(tree: StirlingTree, id: number): StirlingNodeView {
  return nodeAt(tree, id)
}

/** 根ノード */
export function getRoot(tree: StirlingTree): StirlingNodeView {
  return getNode(tree, 0)
}

/**
 * 後順で全ノードの値を埋め、根の値を返す。
 * 木の形には依存せず、漸化式だけで決まる。
 */
export function resolveValues(tree: StirlingTree): number {
  for (let id = tree.nodes.length - 1; id >= 0; id--) {
    const node = nodeAt(tree, id)
    if (node.kind === 'base') continue
    const [kTimes, minusOne] = node.children
    if (kTimes === undefined || minusOne === undefined) {
      throw Error(`無効な状態: recursive ノード ${id} の子が揃っていません`)
    }
    node.value = node.k * valueOf(tree, kTimes) + valueOf(tree, minusOne)
  }
  tree.resolved = true

  const root = getRoot(tree)
  log.debug('resolveValues S(%d,%d) = %d', tree.n, tree.k, root.value)
  return valueOf(tree, root.id)
}

function valueOf(tree: StirlingTree, id: number): number {
  const value = getNode(tree, id).value
  if (value === null) throw Error('未解決のノード: ' + id)
  return value
}

/** BUILT / RESOLVED のどちらか */
export function isResolved(tree: StirlingTree): boolean {
  return tree.resolved
}

/** 走査本体 */
function* walk(tree: StirlingTree, order: TraceOrder): Generator<TraceEvent, void, undefined> {
  let step = 0
  const emit = (id: number): TraceEvent => {
    const node = getNode(tree, id)
    const edge = node.edge === null ? null : (tree.edges[node.edge] ?? null)
    return { step: step++, node, edge }
  }

  if (order === 'dfs') {
    const stack = [0]
    while (stack.length > 0) {
      const id = stack.pop()
      if (id === undefined) break
      yield emit(id)
      const [kTimes, minusOne] = getNode(tree, id).children
      if (minusOne !== undefined) stack.push(minusOne)
      if (kTimes !== undefined) stack.push(kTimes)
    }
    return
  }

  const queue = new FifoQueue<number>()
  queue.push(0)
  while (!queue.isEmpty()) {
    const id = queue.shift()
    if (id === undefined) break
    yield emit(id)
    for (const child of getNode(tree, id).children) queue.push(child)
  }
}

/**
 * ノード出現イベントの遅延列。
 * 反復するたびに同じ列を最初から再生する。
 */
export function trace(tree: StirlingTree, order: TraceOrder = 'dfs'): Iterable<TraceEvent> {
  return {
    [Symbol.iterator]: () => walk(tree, order),
  }
}

/** 子ノードの要約 */
export interface NodeSummary {
  n: number
  k: number
  value: number
}

/** describeNode の結果 */
export interface NodeInfo {
  node: StirlingNodeView
  kTimes: NodeSummary | null
  minusOne: NodeSummary | null
  totalNodes: number
}

function summarize(tree: StirlingTree, id: number | undefined): NodeSummary | null {
  if (id === undefined) return null
  const { n, k } = getNode(tree, id)
  return { n, k, value: stirling2(n, k) }
}

/**
 * ノードとその子の情報。
 * 値は stirling2 から取るので、resolveValues 前でも使える。
 */
export function describeNode(tree: StirlingTree, id: number): NodeInfo {
  const node = getNode(tree, id)
  const [kTimes, minusOne] = node.children
  return {
    node,
    kTimes: summarize(tree, kTimes),
    minusOne: summarize(tree, minusOne),
    totalNodes: tree.nodes.length,
  }
}

/** `S(3,2) = 3`、未解決なら `S(3,2) = ?` */
export function nodeLabel(node: StirlingNodeView): string {
  return `S(${node.n},${node.k}) = ${node.value === null ? '?' : node.value}`
}

/** 辺のラベル: k-times は `2·S(2,2)`、minus-one は `S(2,1)` */
export function edgeLabel(tree: StirlingTree, edge: Readonly<StirlingEdge>): string {
  const parent = getNode(tree, edge.parent)
  const child = getNode(tree, edge.child)
  const term = `S(${child.n},${child.k})`
  return edge.term === 'k-times' ? `${parent.k}·${term}` : term
}

/** `S(3,2) = 2·S(2,2) + S(2,1)`、base は `S(2,2) = 1` */
export function formatRecurrence(tree: StirlingTree, node: StirlingNodeView): string {
  const head = `S(${node.n},${node.k})`
  if (node.kind === 'base') return `${head} = ${baseValue(node.n, node.k)}`
  const terms = node.children.map((child) => {
    const edge = getNode(tree, child).edge
    if (edge === null) throw Error('辺のない子ノード: ' + child)
    const record = tree.edges[edge]
    if (record === undefined) throw Error('無効な辺id: ' + edge)
    return edgeLabel(tree, record)
  })
  return `${head} = ${terms.join(' + ')}`
}
