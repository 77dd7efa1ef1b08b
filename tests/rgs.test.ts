import { describe, it, expect } from 'vitest'
import {
  blockCount,
  blockSizes,
  blocksOf,
  fillMax,
  fillMin,
  formatBlocks,
  isRGS,
  predecessor,
  successor,
} from '../src/rgs.js'
import type { BlockRange } from '../src/types.js'

/** a から制限ベクトルを作る */
function restrictionOf(a: readonly number[]): number[] {
  const restriction: number[] = []
  let opened = 0
  for (const v of a) {
    restriction.push(opened)
    opened = Math.max(opened, v + 1)
  }
  return restriction
}

const ALL4: BlockRange = { min: 1, max: 4 }

describe('fillMin', () => {
  it('足りないブロックを末尾でまとめて開く', () => {
    const a = [0, 0, 0, 0]
    const restriction = [0, 0, 0, 0]
    fillMin(a, restriction, 0, { min: 2, max: 2 })
    expect(a).toEqual([0, 0, 0, 1])
    expect(restriction).toEqual([0, 1, 1, 1])
  })

  it('k = n なら全ての位置でブロックを開く', () => {
    const a = [0, 0, 0]
    const restriction = [0, 0, 0]
    fillMin(a, restriction, 0, { min: 3, max: 3 })
    expect(a).toEqual([0, 1, 2])
  })

  it('from より左は書き換えない', () => {
    const a = [0, 1, 9, 9]
    const restriction = [0, 1, 9, 9]
    fillMin(a, restriction, 2, ALL4)
    expect(a).toEqual([0, 1, 0, 0])
    expect(restriction).toEqual([0, 1, 2, 2])
  })
})

describe('fillMax', () => {
  it('全分割では [0,1,...,n-1]', () => {
    const a = [0, 0, 0, 0, 0]
    const restriction = [0, 0, 0, 0, 0]
    fillMax(a, restriction, 0, { min: 1, max: 5 })
    expect(a).toEqual([0, 1, 2, 3, 4])
  })

  it('max に達したら最後のラベルを繰り返す', () => {
    const a = [0, 0, 0, 0, 0]
    const restriction = [0, 0, 0, 0, 0]
    fillMax(a, restriction, 0, { min: 3, max: 3 })
    expect(a).toEqual([0, 1, 2, 2, 2])
    expect(restriction).toEqual([0, 1, 2, 3, 3])
  })
})

describe('successor', () => {
  it('一番右の増やせる位置を増やし、右側を最小に戻す', () => {
    const a = [0, 0, 1, 2]
    const restriction = restrictionOf(a)
    expect(successor(a, restriction, ALL4)).toBe(true)
    expect(a).toEqual([0, 1, 0, 0])
    expect(restriction).toEqual(restrictionOf(a))
  })

  it('最後のRGSでは false を返し、何も変えない', () => {
    const a = [0, 1, 2, 3]
    const restriction = restrictionOf(a)
    expect(successor(a, restriction, ALL4)).toBe(false)
    expect(a).toEqual([0, 1, 2, 3])
  })

  it('上限 max を超えるラベルは使わない', () => {
    const a = [0, 0, 1, 1]
    const restriction = restrictionOf(a)
    expect(successor(a, restriction, { min: 2, max: 2 })).toBe(true)
    expect(a).toEqual([0, 1, 0, 0])
  })
})

describe('predecessor', () => {
  it('一番右の減らせる位置を減らし、右側を最大にする', () => {
    const a = [0, 1, 0, 0]
    const restriction = restrictionOf(a)
    expect(predecessor(a, restriction, ALL4)).toBe(true)
    expect(a).toEqual([0, 0, 1, 2])
    expect(restriction).toEqual(restrictionOf(a))
  })

  it('減らすと min に届かない位置は飛ばす', () => {
    const a = [0, 0, 0, 1]
    const restriction = restrictionOf(a)
    expect(predecessor(a, restriction, { min: 2, max: 2 })).toBe(false)
    expect(a).toEqual([0, 0, 0, 1])
  })

  it('exact-k で前のRGSへ戻る', () => {
    const a = [0, 1, 0, 0]
    const restriction = restrictionOf(a)
    expect(predecessor(a, restriction, { min: 2, max: 2 })).toBe(true)
    expect(a).toEqual([0, 0, 1, 1])
  })
})

describe('isRGS', () => {
  it('成長制約を満たす列を受け付ける', () => {
    expect(isRGS([])).toBe(true)
    expect(isRGS([0])).toBe(true)
    expect(isRGS([0, 1, 0, 2])).toBe(true)
  })

  it('制約違反を弾く', () => {
    expect(isRGS([1])).toBe(false)
    expect(isRGS([0, 2])).toBe(false)
    expect(isRGS([0, -1])).toBe(false)
    expect(isRGS([0, 0.5])).toBe(false)
  })
})

describe('blocksOf', () => {
  it('ラベル順のブロックに1始まりの要素を並べる', () => {
    expect(blocksOf([0, 0, 1, 0, 2])).toEqual([[1, 2, 4], [3], [5]])
  })

  it('空のRGSは空の分割', () => {
    expect(blocksOf([])).toEqual([])
  })

  it('ブロック数と大きさ', () => {
    const blocks = blocksOf([0, 1, 1, 0, 2, 1])
    expect(blockCount([0, 1, 1, 0, 2, 1])).toBe(3)
    expect(blockSizes(blocks)).toEqual([2, 3, 1])
    expect(blockCount([])).toBe(0)
  })
})

describe('formatBlocks', () => {
  it('波括弧の文字列にする', () => {
    expect(formatBlocks([[1, 4], [2, 3, 5], [6]])).toBe('{ {1, 4}, {2, 3, 5}, {6} }')
  })

  it('空の分割', () => {
    expect(formatBlocks([])).toBe('{ }')
  })
})
