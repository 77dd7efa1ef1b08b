/**
 * 制限成長列（RGS）の辞書順の後続・前任
 *
 * Stamatelatos & Efraimidis "Lexicographic Enumeration of Set Partitions"
 * のアルゴリズムV（全分割）とX（ちょうどkブロック）を、
 * ブロック数の範囲 [min, max] を受け取る一つの手続きにまとめたもの。
 *
 * 状態は a（RGS）と restriction（制限ベクトル）の2本の配列:
 *   restriction[i] = a[0..i-1] で開かれたブロック数
 *   0 ≤ a[i] ≤ restriction[i]（a[i] = restriction[i] は新しいブロックを開く）
 * 書き換えた位置より右の restriction だけを差分で更新する。
 */

import type { Block, BlockRange, RGS } from './types.js'

/** position の restriction を左隣から計算 */
function restrictionAt(a: readonly number[], restriction: readonly number[], position: number): number {
  if (position === 0) return 0
  return Math.max(restriction[position - 1] ?? 0, (a[position - 1] ?? 0) + 1)
}

/**
 * from 以降を辞書順最小の補完で埋める。
 * 足りないブロックは末尾の位置でまとめて開く。
 */
export function fillMin(a: number[], restriction: number[], from: number, range: BlockRange): void {
  const n = a.length
  for (let i = from; i < n; i++) {
    const opened = restrictionAt(a, restriction, i)
    restriction[i] = opened
    // 残り全ての位置で新しいブロックを開かないと min に届かない
    a[i] = range.min - opened >= n - i ? opened : 0
  }
}

/**
 * from 以降を辞書順最大の補完で埋める。
 * max に達するまでブロックを開き、その後は最後のラベルを使う。
 */
export function fillMax(a: number[], restriction: number[], from: number, range: BlockRange): void {
  const n = a.length
  for (let i = from; i < n; i++) {
    const opened = restrictionAt(a, restriction, i)
    restriction[i] = opened
    a[i] = Math.min(opened, range.max - 1)
  }
}

/**
 * 辞書順で次のRGSへ in-place で進める。
 * 増やせる位置が無ければ false（a は最後のRGSのまま）。
 *
 * 現在の列が min 以上のブロックを持つ以上、ある位置を1増やしても
 * その位置までに開かれるブロック数は減らないので、min の補完可能性は保たれる。
 */
export function successor(a: number[], restriction: number[], range: BlockRange): boolean {
  for (let c = a.length - 1; c > 0; c--) {
    const value = a[c] ?? 0
    if (value < (restriction[c] ?? 0) && value < range.max - 1) {
      a[c] = value + 1
      fillMin(a, restriction, c + 1, range)
      return true
    }
  }
  return false
}

/**
 * 辞書順で前のRGSへ in-place で戻す。
 * 減らせる位置が無ければ false（a は最初のRGSのまま）。
 */
export function predecessor(a: number[], restriction: number[], range: BlockRange): boolean {
  const n = a.length
  for (let c = n - 1; c > 0; c--) {
    const value = a[c] ?? 0
    if (value === 0) continue
    // value-1 にしたとき、残りの位置を全部新ブロックにしても min に届くか
    const opened = Math.max(restriction[c] ?? 0, value)
    if (opened + (n - 1 - c) < range.min) continue
    a[c] = value - 1
    fillMax(a, restriction, c + 1, range)
    return true
  }
  return false
}

/** RGSの不変条件を満たすか */
export function isRGS(values: readonly number[]): boolean {
  let blocks = 0
  for (const v of values) {
    if (!Number.isInteger(v) || v < 0 || v > blocks) return false
    if (v === blocks) blocks++
  }
  return true
}

/** ブロック数 = max(a) + 1（空列は0） */
export function blockCount(rgs: RGS): number {
  let max = -1
  for (const v of rgs) if (v > max) max = v
  return max + 1
}

/**
 * RGSからブロックのリストを作る。
 * ブロックはラベル順 (0,1,2,...)、要素は1始まりの昇順。
 */
export function blocksOf(rgs: RGS): Block[] {
  const blocks: Block[] = []
  rgs.forEach((label, i) => {
    let block = blocks[label]
    if (block === undefined) {
      block = []
      blocks[label] = block
    }
    block.push(i + 1)
  })
  return blocks
}

/** 各ブロックの大きさ */
export function blockSizes(blocks: readonly Block[]): number[] {
  return blocks.map((b) => b.length)
}

/** `{ {1, 4}, {2, 3, 5}, {6} }` 形式の文字列 */
export function formatBlocks(blocks: readonly Block[]): string {
  if (blocks.length === 0) return '{ }'
  return '{ ' + blocks.map((b) => '{' + b.join(', ') + '}').join(', ') + ' }'
}
