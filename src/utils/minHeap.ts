// ---------------------------------------------------------------------------
// MinHeap — the planner's frontier.
// Ordered by priority; equal priorities pop in insertion order so a fixed
// input always produces the same path.
// ---------------------------------------------------------------------------

interface HeapEntry<T> {
    priority: number;
    seq: number;
    value: T;
}

export class MinHeap<T> {
    private data: HeapEntry<T>[] = [];
    private counter = 0;

    get size(): number {
        return this.data.length;
    }

    push(value: T, priority: number): void {
        this.data.push({ priority, seq: this.counter++, value });
        this.bubbleUp(this.data.length - 1);
    }

    pop(): { value: T; priority: number } | undefined {
        const top = this.data[0];
        const last = this.data.pop();
        if (this.data.length > 0 && last !== undefined) {
            this.data[0] = last;
            this.sinkDown(0);
        }
        return top ? { value: top.value, priority: top.priority } : undefined;
    }

    private bubbleUp(i: number): void {
        const data = this.data;
        while (i > 0) {
            const parent = (i - 1) >> 1;
            if (this.less(i, parent)) {
                [data[i], data[parent]] = [data[parent], data[i]];
                i = parent;
            } else {
                break;
            }
        }
    }

    private sinkDown(i: number): void {
        const data = this.data;
        const n = data.length;
        while (true) {
            let smallest = i;
            const left = 2 * i + 1;
            const right = 2 * i + 2;
            if (left < n && this.less(left, smallest)) smallest = left;
            if (right < n && this.less(right, smallest)) smallest = right;
            if (smallest === i) break;
            [data[i], data[smallest]] = [data[smallest], data[i]];
            i = smallest;
        }
    }

    private less(a: number, b: number): boolean {
        const ea = this.data[a];
        const eb = this.data[b];
        if (ea.priority !== eb.priority) return ea.priority < eb.priority;
        return ea.seq < eb.seq;
    }
}
