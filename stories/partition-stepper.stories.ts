/**
 * 分割の列挙デモストーリー
 *
 * カーソルを前後に動かし、RGS とブロック表現を並べて表示する。
 * 円周上の描画はしない（テキストのみ）。
 */

import type { Meta, StoryObj } from '@storybook/html-vite'
import type { EnumerationModeName, PartitionCursor } from '../src/types.js'
import { count, first, last, next, previous } from '../src/enumerator.js'
import { blockSizes, blocksOf, formatBlocks } from '../src/rgs.js'

const STYLES = `
  .partition-demo {
    font-family: system-ui, -apple-system, sans-serif;
    max-width: 640px;
    margin: 24px auto;
    padding: 24px;
  }
  .partition-demo .rgs {
    font-family: monospace;
    font-size: 20px;
    padding: 12px;
    background: #f0f6ff;
    border: 1px solid #4a90d9;
    border-radius: 6px;
  }
  .partition-demo .blocks {
    font-family: monospace;
    font-size: 16px;
    margin: 12px 0;
  }
  .partition-demo .stats { font-size: 13px; color: #666; }
  .partition-demo button {
    margin-right: 8px;
    padding: 8px 16px;
    border: none;
    border-radius: 4px;
    background: #4a90d9;
    color: white;
    cursor: pointer;
  }
`

interface DemoArgs {
  n: number
  mode: EnumerationModeName
  k?: number
}

function createDemoUI({ n, mode, k }: DemoArgs): HTMLElement {
  const container = document.createElement('div')
  container.className = 'partition-demo'
  container.innerHTML = `
    <style>${STYLES}</style>
    <div class="rgs"></div>
    <div class="blocks"></div>
    <div class="stats"></div>
    <div class="controls">
      <button data-action="first">⏮ 最初</button>
      <button data-action="prev">⬅ 前へ</button>
      <button data-action="next">次へ ➡</button>
      <button data-action="last">最後 ⏭</button>
    </div>
  `

  const total = count(n, mode, k)
  let cursor: PartitionCursor = first(n, mode, k)

  const rgsEl = container.querySelector<HTMLElement>('.rgs')
  const blocksEl = container.querySelector<HTMLElement>('.blocks')
  const statsEl = container.querySelector<HTMLElement>('.stats')

  function render() {
    const blocks = blocksOf(cursor.rgs)
    if (rgsEl) rgsEl.textContent = `[${cursor.rgs.join(', ')}]`
    if (blocksEl) blocksEl.textContent = formatBlocks(blocks)
    if (statsEl) {
      statsEl.textContent =
        `${cursor.rank + 1} / ${total}　ブロック数: ${blocks.length}　大きさ: [${blockSizes(blocks).join(', ')}]`
    }
  }

  container.addEventListener('click', (event) => {
    const target = event.target
    if (!(target instanceof HTMLButtonElement)) return
    switch (target.dataset.action) {
      case 'first':
        cursor = first(n, mode, k)
        break
      case 'prev':
        previous(cursor)
        break
      case 'next':
        next(cursor)
        break
      case 'last':
        cursor = last(n, mode, k)
        break
    }
    render()
  })

  render()
  return container
}

const meta: Meta<DemoArgs> = {
  title: '集合分割の列挙',
  render: (args) => createDemoUI(args),
}

export default meta
type Story = StoryObj<DemoArgs>

/** 全ての分割 (n = 4) */
export const AllPartitions: Story = {
  args: { n: 4, mode: 'all' },
}

/** ちょうど3ブロック (n = 5) */
export const ExactlyThreeBlocks: Story = {
  args: { n: 5, mode: 'exact-k', k: 3 },
}
