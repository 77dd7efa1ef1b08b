/**
 * 再帰木のアニメーションデモストーリー
 *
 * TraceStepper を一定間隔で step() して、出現したノードを順に並べる。
 * タイマーはストーリー側が持つ。
 */

import type { Meta, StoryObj } from '@storybook/html-vite'
import type { TraceOrder } from '../src/types.js'
import { buildTree, edgeLabel, formatRecurrence, nodeLabel, resolveValues } from '../src/recurrence-tree.js'
import { TraceStepper } from '../src/trace-stepper.js'

const STYLES = `
  .tree-demo {
    font-family: system-ui, -apple-system, sans-serif;
    max-width: 720px;
    margin: 24px auto;
    padding: 24px;
  }
  .tree-demo ol { font-family: monospace; font-size: 14px; }
  .tree-demo li.base { color: #ff7f0e; }
  .tree-demo li.recursive { color: #1f77b4; }
  .tree-demo .stats { font-size: 13px; color: #666; margin: 8px 0; }
`

interface DemoArgs {
  n: number
  k: number
  order: TraceOrder
  /** オートプレイの間隔（ミリ秒） */
  interval: number
}

function createDemoUI({ n, k, order, interval }: DemoArgs): HTMLElement {
  const container = document.createElement('div')
  container.className = 'tree-demo'
  container.innerHTML = `
    <style>${STYLES}</style>
    <div class="stats"></div>
    <div class="controls">
      <button data-action="play">▶ 再生</button>
      <button data-action="pause">⏸ 一時停止</button>
      <button data-action="back">⬅ 戻る</button>
      <button data-action="step">進む ➡</button>
      <button data-action="reset">⏮ 最初から</button>
    </div>
    <ol></ol>
  `

  // ブラウザには process.env が無いので上限は明示する
  const tree = buildTree(n, k, { maxNodes: 10_000 })
  const rootValue = resolveValues(tree)
  const stepper = new TraceStepper(tree, order)
  let timer: number | null = null

  const listEl = container.querySelector<HTMLElement>('ol')
  const statsEl = container.querySelector<HTMLElement>('.stats')

  function render() {
    if (statsEl) {
      statsEl.textContent =
        `S(${n},${k}) = ${rootValue}　ノード ${stepper.position} / ${stepper.total}　(${stepper.state})`
    }
    if (!listEl) return
    listEl.innerHTML = ''
    for (const event of stepper.visible()) {
      const li = document.createElement('li')
      li.className = event.node.kind
      const via = event.edge ? ` ← ${edgeLabel(tree, event.edge)}` : ''
      li.textContent = `${nodeLabel(event.node)}${via}　[${formatRecurrence(tree, event.node)}]`
      li.style.marginLeft = `${event.node.depth * 16}px`
      listEl.appendChild(li)
    }
  }

  function pause() {
    if (timer !== null) window.clearInterval(timer)
    timer = null
  }

  container.addEventListener('click', (event) => {
    const target = event.target
    if (!(target instanceof HTMLButtonElement)) return
    switch (target.dataset.action) {
      case 'play':
        if (timer !== null) break
        timer = window.setInterval(() => {
          if (stepper.step() === null) pause()
          render()
        }, interval)
        break
      case 'pause':
        pause()
        break
      case 'back':
        stepper.back()
        break
      case 'step':
        stepper.step()
        break
      case 'reset':
        pause()
        stepper.reset()
        break
    }
    render()
  })

  render()
  return container
}

const meta: Meta<DemoArgs> = {
  title: 'スターリング数の再帰木',
  render: (args) => createDemoUI(args),
}

export default meta
type Story = StoryObj<DemoArgs>

/** 深さ優先 */
export const DepthFirst: Story = {
  args: { n: 4, k: 2, order: 'dfs', interval: 800 },
}

/** 幅優先 */
export const BreadthFirst: Story = {
  args: { n: 4, k: 2, order: 'bfs', interval: 800 },
}
