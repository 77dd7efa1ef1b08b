/**
 * 列挙モード
 *
 * 各モードは要求 (n, k) をブロック数の範囲に変換するだけ。
 * 後続・前任の計算（rgs.ts）は範囲しか見ないので、
 * 新しいモードはここに登録するだけで追加できる。
 */

import { InvalidRequestError } from './errors.js'
import type { BlockRange, EnumerationMode, EnumerationModeName } from './types.js'

/** 全ての分割（アルゴリズムV） */
const allMode: EnumerationMode = {
  name: 'all',
  blockRange(n: number): BlockRange {
    // n = 0 は空の分割1つだけ
    return n === 0 ? { min: 0, max: 0 } : { min: 1, max: n }
  },
}

/** ちょうど k ブロック（アルゴリズムX） */
const exactKMode: EnumerationMode = {
  name: 'exact-k',
  blockRange(n: number, k: number | undefined): BlockRange {
    if (k === undefined) {
      throw new InvalidRequestError('exact-k には k が必要です')
    }
    if (k > n) {
      throw new InvalidRequestError(`k (${k}) は n (${n}) 以下でなければなりません`)
    }
    if (k === 0 && n > 0) {
      throw new InvalidRequestError(`n > 0 のとき k = 0 の分割は存在しません (n = ${n})`)
    }
    return { min: k, max: k }
  },
}

const MODES: Record<EnumerationModeName, EnumerationMode> = {
  all: allMode,
  'exact-k': exactKMode,
}

/** モード名から列挙モードを取得 */
export function getMode(name: EnumerationModeName): EnumerationMode {
  return MODES[name]
}
