/**
 * Fixed-capacity window with a running sum.
 *
 * The evicted value is subtracted from the sum, so mean() never re-sums.
 * Eviction shifts the backing array; capacities here are indicator windows.
 */
export class RollingWindow {
    private readonly values: number[] = [];
    private _sum = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`RollingWindow capacity must be a positive integer, got ${capacity}`);
        }
    }

    push(value: number): void {
        this.values.push(value);
        this._sum += value;
        if (this.values.length > this.capacity) {
            const evicted = this.values.shift();
            if (evicted !== undefined) this._sum -= evicted;
        }
    }

    get size(): number {
        return this.values.length;
    }

    get isFull(): boolean {
        return this.values.length === this.capacity;
    }

    get sum(): number {
        return this._sum;
    }

    mean(): number {
        return this.values.length === 0 ? 0 : this._sum / this.values.length;
    }

    oldest(): number | undefined {
        return this.values[0];
    }
}
