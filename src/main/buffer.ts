/** Append-only in-memory sequence owned by a single producer */
export class SequenceBuffer<T> {
  private items: T[] = [];

  add(item: T): number {
    this.items.push(item);
    return this.items.length;
  }

  drain(): T[] {
    const out = this.items;
    this.items = [];
    return out;
  }
}
