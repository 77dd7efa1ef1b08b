/**
 * トレースのステップ実行
 *
 * UIのアニメーション用。タイマーは持たず、呼び出し側が好きな間隔で
 * step() を呼ぶ（オートプレイも同じ）。
 * 一度出したイベントはバッファに残すので、back() / reset() / seek() は
 * 木を作り直さない。
 */

import { createLogger } from './log.js'
import { trace } from './recurrence-tree.js'
import type { StepperState, StirlingTree, TraceEvent, TraceOrder } from './types.js'

const log = createLogger('tree')

export class TraceStepper {
  readonly tree: StirlingTree
  readonly order: TraceOrder
  private readonly source: Iterator<TraceEvent>
  /** これまでに取り出したイベント */
  private readonly events: TraceEvent[] = []
  /** 表示中のイベント数 */
  private cursor = 0

  constructor(tree: StirlingTree, order: TraceOrder = 'dfs') {
    this.tree = tree
    this.order = order
    this.source = trace(tree, order)[Symbol.iterator]()
  }

  /** 全イベント数（= ノード数） */
  get total(): number {
    return this.tree.nodes.length
  }

  /** 表示中のイベント数 */
  get position(): number {
    return this.cursor
  }

  get state(): StepperState {
    if (this.cursor === 0) return 'ready'
    return this.cursor >= this.total ? 'done' : 'stepping'
  }

  /** 次のイベントを出す。終端なら null */
  step(): TraceEvent | null {
    if (this.cursor < this.events.length) {
      return this.events[this.cursor++] ?? null
    }
    const result = this.source.next()
    if (result.done) return null
    this.events.push(result.value)
    this.cursor++
    return result.value
  }

  /** 最後に出したイベントを引っ込めて返す。先頭なら null */
  back(): TraceEvent | null {
    if (this.cursor === 0) return null
    this.cursor--
    return this.events[this.cursor] ?? null
  }

  /** 最初のイベントの前に戻す */
  reset(): void {
    log.debug('reset stepper (%s) at %d/%d', this.order, this.cursor, this.total)
    this.cursor = 0
  }

  /** 表示数を position にする（[0, total] に丸める） */
  seek(position: number): void {
    const target = Math.max(0, Math.min(Math.trunc(position), this.total))
    while (this.cursor > target) this.back()
    while (this.cursor < target) {
      if (this.step() === null) break
    }
  }

  /** 表示中のイベント */
  visible(): readonly TraceEvent[] {
    return this.events.slice(0, this.cursor)
  }
}
