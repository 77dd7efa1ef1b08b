/**
 * 集合分割の列挙カーソル
 *
 * 1セッションにつき1つのカーソルを持ち、next / previous で
 * 辞書順に前後へ移動する。末尾・先頭では null を返し、例外は投げない。
 */

import { createLogger } from './log.js'
import { getMode } from './modes.js'
import { blocksOf, fillMax, fillMin, predecessor, successor } from './rgs.js'
import { countInRange } from './stirling.js'
import { parseEnumerationRequest } from './validation.js'
import type { Block, EnumerationModeName, PartitionCursor, RGS } from './types.js'

const log = createLogger('enumerator')

/** 要求を検証してカーソルの骨組みを作る（a は未初期化） */
function createCursor(n: number, mode: EnumerationModeName, k?: number): PartitionCursor {
  const req = parseEnumerationRequest({ n, mode, k })
  const range = getMode(req.mode).blockRange(req.n, req.k)
  return {
    n: req.n,
    mode: req.mode,
    k: req.mode === 'exact-k' ? (req.k ?? null) : null,
    range,
    rgs: new Array<number>(req.n).fill(0),
    restriction: new Array<number>(req.n).fill(0),
    rank: 0,
    exhausted: false,
  }
}

/**
 * 辞書順で最小のRGSを指すカーソルを作る。
 *   all:     [0,0,...,0]
 *   exact-k: [0,...,0,1,2,...,k-1]
 */
export function first(n: number, mode: EnumerationModeName, k?: number): PartitionCursor {
  const cursor = createCursor(n, mode, k)
  fillMin(cursor.rgs, cursor.restriction, 0, cursor.range)
  log.info('first n=%d mode=%s k=%o', cursor.n, cursor.mode, cursor.k)
  return cursor
}

/**
 * 辞書順で最大のRGSを指すカーソルを作る。
 *   all:     [0,1,...,n-1]
 *   exact-k: [0,1,...,k-1,k-1,...,k-1]
 */
export function last(n: number, mode: EnumerationModeName, k?: number): PartitionCursor {
  const cursor = createCursor(n, mode, k)
  fillMax(cursor.rgs, cursor.restriction, 0, cursor.range)
  cursor.rank = countInRange(cursor.n, cursor.range.min, cursor.range.max) - 1
  log.info('last n=%d mode=%s k=%o', cursor.n, cursor.mode, cursor.k)
  return cursor
}

/** 次のRGSへ進める。末尾なら null（カーソルは末尾のまま） */
export function next(cursor: PartitionCursor): RGS | null {
  if (!successor(cursor.rgs, cursor.restriction, cursor.range)) {
    if (!cursor.exhausted) log.debug('exhausted at rank %d', cursor.rank)
    cursor.exhausted = true
    return null
  }
  cursor.rank++
  return cursor.rgs
}

/** 前のRGSへ戻す。先頭なら null */
export function previous(cursor: PartitionCursor): RGS | null {
  if (!predecessor(cursor.rgs, cursor.restriction, cursor.range)) return null
  cursor.rank--
  cursor.exhausted = false
  return cursor.rgs
}

/**
 * 分割の総数。
 * all はベル数 B(n)、exact-k は S(n,k)。
 */
export function count(n: number, mode: EnumerationModeName, k?: number): number {
  const req = parseEnumerationRequest({ n, mode, k })
  const range = getMode(req.mode).blockRange(req.n, req.k)
  return countInRange(req.n, range.min, range.max)
}

/** 列挙本体（要求は検証済み） */
function* walk(cursor: PartitionCursor): Generator<number[], void, undefined> {
  yield cursor.rgs.slice()
  while (next(cursor) !== null) {
    yield cursor.rgs.slice()
  }
}

/**
 * 全てのRGSを辞書順に返す遅延ジェネレータ。
 * 要求の検証は最初の取り出しを待たずにここで行う。
 */
export function enumeratePartitions(
  n: number,
  mode: EnumerationModeName,
  k?: number,
): Generator<number[], void, undefined> {
  return walk(first(n, mode, k))
}

/** enumeratePartitions のブロック表現版 */
export function enumerateBlocks(
  n: number,
  mode: EnumerationModeName,
  k?: number,
): Generator<Block[], void, undefined> {
  const cursor = first(n, mode, k)
  return (function* () {
    for (const rgs of walk(cursor)) yield blocksOf(rgs)
  })()
}
