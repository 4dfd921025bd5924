/**
 * Binary min-heap ordered by a comparator.
 *
 * The comparator decides ties; callers that need stable ordering should
 * include an insertion counter in their items.
 */
export class MinHeap<T> {
  private items: T[] = []

  constructor(private readonly compare: (a: T, b: T) => number) {}

  push(item: T): void {
    this.items.push(item)
    this.siftUp(this.items.length - 1)
  }

  pop(): T | undefined {
    const items = this.items
    if (items.length === 0) return undefined

    const top = items[0]
    const last = items.pop()
    if (items.length > 0 && last !== undefined) {
      items[0] = last
      this.siftDown(0)
    }
    return top
  }

  peek(): T | undefined {
    return this.items[0]
  }

  size(): number {
    return this.items.length
  }

  isEmpty(): boolean {
    return this.items.length === 0
  }

  /**
   * Remove and return every item in heap order.
   */
  drain(): T[] {
    const drained: T[] = []
    let item = this.pop()
    while (item !== undefined) {
      drained.push(item)
      item = this.pop()
    }
    return drained
  }

  private siftUp(index: number): void {
    const items = this.items
    let child = index
    while (child > 0) {
      const parent = (child - 1) >> 1
      if (this.compare(items[child], items[parent]) >= 0) break
      this.swap(child, parent)
      child = parent
    }
  }

  private siftDown(index: number): void {
    const items = this.items
    const length = items.length
    let parent = index

    for (;;) {
      const left = parent * 2 + 1
      const right = left + 1
      let smallest = parent

      if (left < length && this.compare(items[left], items[smallest]) < 0) {
        smallest = left
      }
      if (right < length && this.compare(items[right], items[smallest]) < 0) {
        smallest = right
      }
      if (smallest === parent) return

      this.swap(parent, smallest)
      parent = smallest
    }
  }

  private swap(a: number, b: number): void {
    const items = this.items
    const tmp = items[a]
    items[a] = items[b]
    items[b] = tmp
  }
}
