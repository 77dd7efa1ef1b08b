/**
 * 配列ベースのFIFOキュー
 * 先頭インデックスを進めるだけで取り出し、半分以上が消費済みになったら詰める。
 */
export class FifoQueue<T> {
  private items: T[] = []
  private head = 0

  get size(): number {
    return this.items.length - this.head
  }

  isEmpty(): boolean {
    return this.size === 0
  }

  /** 末尾に追加 */
  push(value: T): void {
    this.items.push(value)
  }

  /** 先頭を取り出す */
  shift(): T | undefined {
    if (this.head >= this.items.length) return undefined
    const value = this.items[this.head]
    this.head++
    if (this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head)
      this.head = 0
    }
    return value
  }

  /** 先頭を参照（取り出さない） */
  peek(): T | undefined {
    return this.items[this.head]
  }
}
