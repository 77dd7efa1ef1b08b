/**
 * 再帰木の配置
 *
 * x は中順（k-times 側 → ノード → minus-one 側）の通し番号、
 * y は深さ × yStep。描画はしない。
 */

import { DEFAULT_LAYOUT_Y_STEP } from './config.js'
import { getNode } from './recurrence-tree.js'
import type { StirlingTree } from './types.js'

export interface Point {
  x: number
  y: number
}

export interface LayoutOptions {
  /** 1段あたりの y の変化量 */
  yStep?: number
}

/** ノードidごとの座標 */
export function layoutTree(tree: StirlingTree, options: LayoutOptions = {}): Point[] {
  const yStep = options.yStep ?? DEFAULT_LAYOUT_Y_STEP
  const points: Point[] = new Array<Point>(tree.nodes.length)
  if (tree.nodes.length === 0) return points

  const stack: number[] = []
  let current: number | undefined = 0
  let x = 0

  while (current !== undefined || stack.length > 0) {
    // 左（k-times 側）へ降りられるだけ降りる
    while (current !== undefined) {
      stack.push(current)
      current = getNode(tree, current).children[0]
    }
    const id = stack.pop()
    if (id === undefined) break
    const node = getNode(tree, id)
    points[id] = { x: x++, y: node.depth * yStep }
    current = node.children[1]
  }

  return points
}
