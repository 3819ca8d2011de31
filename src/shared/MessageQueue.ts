/**
 * FIFO queue with O(1) enqueue/dequeue and an optional capacity.
 */
export class MessageQueue<T> {
    private _head: number = 0;
    private _tail: number = 0;
    private _items: Map<number, T> = new Map();

    constructor(private readonly _capacity: number = Number.POSITIVE_INFINITY) {}

    get capacity(): number {
        return this._capacity;
    }

    /**
     * Adds an item to the end of the queue.
     * Returns false, leaving the queue untouched, when the queue is at capacity.
     */
    enqueue(item: T): boolean {
        if (this.length >= this._capacity) {
            return false;
        }
        this._items.set(this._tail, item);
        this._tail++;
        return true;
    }

    /**
     * Removes and returns the first item from the queue
     */
    dequeue(): T | undefined {
        if (this._head === this._tail) {
            return undefined;
        }
        const item = this._items.get(this._head);
        this._items.delete(this._head);
        this._head++;
        return item;
    }

    /**
     * Returns the first item without removing it
     */
    peek(): T | undefined {
        return this._items.get(this._head);
    }

    /**
     * Removes and returns every queued item, oldest first.
     */
    drain(): T[] {
        const items: T[] = [];
        for (let item = this.dequeue(); item !== undefined; item = this.dequeue()) {
            items.push(item);
        }
        return items;
    }

    get length(): number {
        return this._tail - this._head;
    }

    /**
     * Removes all items from the queue
     */
    clear(): void {
        this._head = 0;
        this._tail = 0;
        this._items.clear();
    }
}
