/** Highest priority first; FIFO among equal priorities. */
export class PriorityJobQueue<T> {
  private readonly items: Array<{ item: T; priority: number }> = [];

  get size(): number {
    return this.items.length;
  }

  push(item: T, priority: number): void {
    let index = this.items.length;
    while (index > 0 && this.items[index - 1].priority < priority) {
      index--;
    }
    this.items.splice(index, 0, { item, priority });
  }

  shift(): T | undefined {
    return this.items.shift()?.item;
  }

  clear(): number {
    const dropped = this.items.length;
    this.items.length = 0;
    return dropped;
  }
}
