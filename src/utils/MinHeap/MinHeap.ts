type Entry<T> = { k: number; seq: number; v: T };

// Binary min-heap keyed by number; equal keys pop in insertion order.
export class MinHeap<T> {
  private a: Entry<T>[] = [];
  private pos = new Map<T, number>();
  private seq = 0;
  size() {
    return this.a.length;
  }
  has(v: T) {
    return this.pos.has(v);
  }
  push(k: number, v: T) {
    if (this.pos.has(v)) throw new Error("value is already queued; use update()");
    this.a.push({ k, seq: this.seq++, v });
    this.pos.set(v, this.a.length - 1);
    this.bubbleUp(this.a.length - 1);
  }
  // Re-key a queued value, keeping its original insertion sequence
  update(k: number, v: T) {
    const i = this.pos.get(v);
    if (i === undefined) throw new Error("value is not queued");
    const old = this.a[i].k;
    this.a[i].k = k;
    if (k < old) this.bubbleUp(i);
    else this.bubbleDown(i);
  }
  pop(): T | undefined {
    const top = this.a[0];
    const last = this.a.pop();
    if (top === undefined || last === undefined) return undefined;
    this.pos.delete(top.v);
    if (this.a.length) {
      this.a[0] = last;
      this.pos.set(last.v, 0);
      this.bubbleDown(0);
    }
    return top.v;
  }
  peekKey(): number | undefined {
    return this.a[0]?.k;
  }
  private less(i: number, j: number) {
    const x = this.a[i],
      y = this.a[j];
    return x.k < y.k || (x.k === y.k && x.seq < y.seq);
  }
  private swap(i: number, j: number) {
    [this.a[i], this.a[j]] = [this.a[j], this.a[i]];
    this.pos.set(this.a[i].v, i);
    this.pos.set(this.a[j].v, j);
  }
  private bubbleUp(i: number) {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(i, p)) break;
      this.swap(i, p);
      i = p;
    }
  }
  private bubbleDown(i: number) {
    const n = this.a.length;
    while (true) {
      const l = i * 2 + 1,
        r = l + 1;
      let m = i;
      if (l < n && this.less(l, m)) m = l;
      if (r < n && this.less(r, m)) m = r;
      if (m === i) break;
      this.swap(m, i);
      i = m;
    }
  }
}
