import { describe, it, expect } from 'vitest'
import {
  count,
  enumerateBlocks,
  enumeratePartitions,
  first,
  last,
  next,
  previous,
} from '../src/enumerator.js'
import { InvalidRequestError } from '../src/errors.js'
import { isRGS, blockCount } from '../src/rgs.js'

const BELL = [1, 1, 2, 5, 15, 52, 203, 877]

/** S(n,k) の表（n = 1..6） */
const STIRLING: Record<number, number[]> = {
  1: [1],
  2: [1, 1],
  3: [1, 3, 1],
  4: [1, 7, 6, 1],
  5: [1, 15, 25, 10, 1],
  6: [1, 31, 90, 65, 15, 1],
}

/** 辞書順比較（負 = a < b） */
function compareLex(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0)
    if (d !== 0) return d
  }
  return a.length - b.length
}

describe('first / last', () => {
  it('全分割の最初は全て0、最後は [0,1,...,n-1]', () => {
    expect(first(4, 'all').rgs).toEqual([0, 0, 0, 0])
    expect(last(4, 'all').rgs).toEqual([0, 1, 2, 3])
  })

  it('exact-k の最初はブロックを末尾で開き、最後は k-1 を繰り返す', () => {
    expect(first(5, 'exact-k', 3).rgs).toEqual([0, 0, 0, 1, 2])
    expect(last(5, 'exact-k', 3).rgs).toEqual([0, 1, 2, 2, 2])
  })

  it('first の rank は 0、last の rank は総数 - 1', () => {
    expect(first(5, 'all').rank).toBe(0)
    expect(last(5, 'all').rank).toBe(51)
    expect(last(5, 'exact-k', 2).rank).toBe(14)
  })

  it('all では k を無視する', () => {
    const cursor = first(3, 'all', 2)
    expect(cursor.k).toBeNull()
    expect(cursor.range).toEqual({ min: 1, max: 3 })
  })

  it('n = 0 は空の分割1つだけ', () => {
    const cursor = first(0, 'all')
    expect(cursor.rgs).toEqual([])
    expect(next(cursor)).toBeNull()
    expect(previous(cursor)).toBeNull()
    expect(first(0, 'exact-k', 0).rgs).toEqual([])
  })
})

describe('不正な要求', () => {
  it('n > 0 で k = 0 は InvalidRequestError', () => {
    expect(() => first(3, 'exact-k', 0)).toThrow(InvalidRequestError)
  })

  it('k > n は InvalidRequestError', () => {
    expect(() => first(3, 'exact-k', 4)).toThrow(InvalidRequestError)
    expect(() => first(0, 'exact-k', 1)).toThrow(InvalidRequestError)
  })

  it('exact-k で k が無いと InvalidRequestError', () => {
    expect(() => first(3, 'exact-k')).toThrow(InvalidRequestError)
  })

  it('負や非整数の n は InvalidRequestError', () => {
    expect(() => first(-1, 'all')).toThrow(InvalidRequestError)
    expect(() => first(2.5, 'all')).toThrow(InvalidRequestError)
    expect(() => count(-1, 'all')).toThrow(InvalidRequestError)
  })

  it('zod の問題箇所を issues に残す', () => {
    try {
      first(-1, 'all')
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidRequestError)
      if (e instanceof InvalidRequestError) {
        expect(e.issues).toHaveLength(1)
        expect(e.issues[0]).toMatch(/^n: /)
      }
    }
  })

  it('ジェネレータは最初の取り出しの前に検証する', () => {
    expect(() => enumeratePartitions(3, 'exact-k', 5)).toThrow(InvalidRequestError)
    expect(() => enumerateBlocks(3, 'exact-k', 0)).toThrow(InvalidRequestError)
  })
})

describe('next', () => {
  it('n = 3 の全分割を辞書順に列挙する', () => {
    expect([...enumeratePartitions(3, 'all')]).toEqual([
      [0, 0, 0],
      [0, 0, 1],
      [0, 1, 0],
      [0, 1, 1],
      [0, 1, 2],
    ])
  })

  it('n = 4, k = 2 を辞書順に列挙する', () => {
    expect([...enumeratePartitions(4, 'exact-k', 2)]).toEqual([
      [0, 0, 0, 1],
      [0, 0, 1, 0],
      [0, 0, 1, 1],
      [0, 1, 0, 0],
      [0, 1, 0, 1],
      [0, 1, 1, 0],
      [0, 1, 1, 1],
    ])
  })

  it('全分割の数はベル数で、狭義単調増加かつ全てRGS', () => {
    for (let n = 0; n < BELL.length; n++) {
      const all = [...enumeratePartitions(n, 'all')]
      expect(all).toHaveLength(BELL[n] ?? -1)
      for (let i = 0; i < all.length; i++) {
        const rgs = all[i] ?? []
        expect(isRGS(rgs)).toBe(true)
        if (i > 0) expect(compareLex(all[i - 1] ?? [], rgs)).toBeLessThan(0)
      }
    }
  })

  it('exact-k の数は S(n,k) で、全てちょうど k ブロック', () => {
    for (let n = 1; n <= 6; n++) {
      for (let k = 1; k <= n; k++) {
        const all = [...enumeratePartitions(n, 'exact-k', k)]
        expect(all).toHaveLength(STIRLING[n]?.[k - 1] ?? -1)
        for (let i = 0; i < all.length; i++) {
          const rgs = all[i] ?? []
          expect(isRGS(rgs)).toBe(true)
          expect(blockCount(rgs)).toBe(k)
          if (i > 0) expect(compareLex(all[i - 1] ?? [], rgs)).toBeLessThan(0)
        }
      }
    }
  })

  it('末尾で null を返し exhausted になる', () => {
    const cursor = last(3, 'all')
    expect(next(cursor)).toBeNull()
    expect(cursor.exhausted).toBe(true)
    expect(cursor.rgs).toEqual([0, 1, 2])
    expect(previous(cursor)).toEqual([0, 1, 1])
    expect(cursor.exhausted).toBe(false)
  })

  it('rank は next / previous に追従する', () => {
    const cursor = first(4, 'all')
    next(cursor)
    next(cursor)
    expect(cursor.rank).toBe(2)
    previous(cursor)
    expect(cursor.rank).toBe(1)
  })
})

describe('previous', () => {
  it('先頭で null を返す', () => {
    expect(previous(first(4, 'all'))).toBeNull()
    expect(previous(first(5, 'exact-k', 3))).toBeNull()
  })

  it('last から previous で辿ると next の逆順になる', () => {
    const forward = [...enumeratePartitions(5, 'exact-k', 3)]
    const cursor = last(5, 'exact-k', 3)
    const backward = [cursor.rgs.slice()]
    while (previous(cursor) !== null) backward.push(cursor.rgs.slice())
    expect(backward).toEqual(forward.reverse())
    expect(cursor.rank).toBe(0)
  })

  it('next の後に previous で元のRGSに戻る', () => {
    const cases: Array<[number, 'all' | 'exact-k', number | undefined]> = [
      [5, 'all', undefined],
      [6, 'exact-k', 3],
    ]
    for (const [n, mode, k] of cases) {
      const cursor = first(n, mode, k)
      for (;;) {
        const before = cursor.rgs.slice()
        if (next(cursor) === null) break
        const after = cursor.rgs.slice()
        expect(previous(cursor)).toEqual(before)
        expect(next(cursor)).toEqual(after)
      }
    }
  })
})

describe('count', () => {
  it('all はベル数', () => {
    expect(count(0, 'all')).toBe(1)
    expect(count(5, 'all')).toBe(52)
    expect(count(7, 'all')).toBe(877)
  })

  it('exact-k は S(n,k)', () => {
    expect(count(5, 'exact-k', 2)).toBe(15)
    expect(count(6, 'exact-k', 3)).toBe(90)
    expect(count(0, 'exact-k', 0)).toBe(1)
  })

  it('n = 22 のベル数まで正確に数える', () => {
    expect(count(22, 'all')).toBe(4506715738447323)
    expect(last(22, 'all').rank).toBe(4506715738447322)
  })

  it('安全な整数を超える総数は InvalidRequestError', () => {
    expect(() => count(23, 'all')).toThrow(InvalidRequestError)
    expect(() => count(30, 'exact-k', 15)).toThrow(InvalidRequestError)
    expect(() => last(23, 'all')).toThrow(InvalidRequestError)
  })

  it('総数を使わない first は大きな n でも使える', () => {
    const cursor = first(23, 'all')
    expect(cursor.rank).toBe(0)
    expect(next(cursor)).toEqual([...new Array<number>(22).fill(0), 1])
  })

  it('n = 30000 でも再帰の深さに縛られない', () => {
    expect(count(30000, 'exact-k', 29999)).toBe(449985000)
    expect(count(30000, 'exact-k', 1)).toBe(1)
    expect(() => count(30000, 'exact-k', 15000)).toThrow(InvalidRequestError)
  })
})

describe('enumerateBlocks', () => {
  it('ブロック表現で列挙する', () => {
    expect([...enumerateBlocks(3, 'exact-k', 2)]).toEqual([
      [[1, 2], [3]],
      [[1, 3], [2]],
      [[1], [2, 3]],
    ])
  })

  it('n = 0 は空の分割1つ', () => {
    expect([...enumerateBlocks(0, 'all')]).toEqual([[]])
  })
})
