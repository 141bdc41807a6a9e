/**
 * FIFO of pending-unit records. Results carry no request id on the wire, so
 * submission order is the only link between a unit and its output.
 */
export class CorrelationQueue<T> {
  private items: T[] = [];

  get size(): number {
    return this.items.length;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  dequeue(): T | undefined {
    return this.items.shift();
  }

  peek(): T | undefined {
    return this.items[0];
  }

  clear(): number {
    const dropped = this.items.length;
    this.items = [];
    return dropped;
  }

  snapshot(): readonly T[] {
    return [...this.items];
  }
}
