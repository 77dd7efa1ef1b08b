/**
 * 第2種スターリング数とベル数
 *
 * S(n,k) = k·S(n-1,k) + S(n-1,k-1)
 * 再帰はせず、行 n' = 0..n を順に埋める。各行で埋めるのは (n,k) に届く列
 * max(0, k-(n-n')) .. min(k, n') だけ。
 * キャッシュはプロセス全体で共有し、追記のみ（キーごとに一度だけ書く）。
 *
 * 値は number で扱い、Number.MAX_SAFE_INTEGER を超える結果は
 * InvalidRequestError にする。1 ≤ k < n では S(n,k) は途中のどのセルより
 * 小さくならないので、途中で超えた時点で打ち切れる。
 */

import { InvalidRequestError } from './errors.js'

/** (n,k) → S(n,k)（安全な整数のみ） */
const stirlingCache = new Map<string, number>()

function key(n: number, k: number): string {
  return `${n},${k}`
}

/**
 * 基底ケースか判定（0 ≤ k ≤ n の範囲で）。
 * S(0,0)=1, S(n,0)=0 (n≥1), S(n,n)=1
 */
export function isBaseCase(n: number, k: number): boolean {
  return k === 0 || n === k
}

/** 基底ケースの値 */
export function baseValue(n: number, k: number): number {
  return n === k ? 1 : 0
}

/** 行ごとに埋めて S(n,k) を求める。安全な整数を超えたら null */
function fill(n: number, k: number): number | null {
  let prev: number[] = [1]
  let prevLo = 0

  for (let m = 1; m <= n; m++) {
    const lo = Math.max(0, k - (n - m))
    const hi = Math.min(k, m)
    const row: number[] = []
    for (let c = lo; c <= hi; c++) {
      if (isBaseCase(m, c)) {
        row.push(baseValue(m, c))
        continue
      }
      const id = key(m, c)
      const hit = stirlingCache.get(id)
      if (hit !== undefined) {
        row.push(hit)
        continue
      }
      const value = c * (prev[c - prevLo] ?? 0) + (prev[c - 1 - prevLo] ?? 0)
      if (value > Number.MAX_SAFE_INTEGER) return null
      stirlingCache.set(id, value)
      row.push(value)
    }
    prev = row
    prevLo = lo
  }

  return prev[k - prevLo] ?? 0
}

/**
 * S(n,k) を返す。範囲外 (k<0, k>n) は 0。
 * Number.MAX_SAFE_INTEGER を超えるなら InvalidRequestError。
 */
export function stirling2(n: number, k: number): number {
  if (k < 0 || k > n) return 0
  if (isBaseCase(n, k)) return baseValue(n, k)

  const hit = stirlingCache.get(key(n, k))
  if (hit !== undefined) return hit

  const value = fill(n, k)
  if (value === null) {
    throw new InvalidRequestError(`S(${n},${k}) は安全な整数の範囲 (2^53-1) を超えます`)
  }
  return value
}

/** ベル数 B(n) = Σ_k S(n,k) */
export function bell(n: number): number {
  return countInRange(n, 0, n)
}

/** ブロック数が range に入る分割の数 */
export function countInRange(n: number, min: number, max: number): number {
  let sum = 0
  for (let k = min; k <= max; k++) {
    sum += stirling2(n, k)
    if (sum > Number.MAX_SAFE_INTEGER) {
      throw new InvalidRequestError(
        `n=${n}, ブロック数 ${min}..${max} の分割数は安全な整数の範囲 (2^53-1) を超えます`,
      )
    }
  }
  return sum
}

/** C(n,r)。Number.MAX_SAFE_INTEGER を超えたら Infinity */
function binomial(n: number, r: number): number {
  const m = Math.min(r, n - r)
  let value = 1
  for (let i = 0; i < m; i++) {
    value = (value * (n - i)) / (i + 1)
    if (value > Number.MAX_SAFE_INTEGER) return Number.POSITIVE_INFINITY
  }
  return value
}

/**
 * 共有なしで展開した S(n,k) の再帰木のノード数（0 ≤ k ≤ n）。
 * T(n,k) = 1 + T(n-1,k) + T(n-1,k-1)、基底で 1 なので 2·C(n,k) - 1。
 * 安全な整数に収まらなければ Infinity。
 */
export function treeSize(n: number, k: number): number {
  if (isBaseCase(n, k)) return 1
  return 2 * binomial(n, k) - 1
}
