export interface Disposable {
    dispose(): void;
}

/**
 * Owner-scoped collection of subscriptions. A view holds one and disposes it on teardown.
 */
export class DisposeBag implements Disposable {
    private items: Disposable[] = [];
    private disposed = false;

    get isDisposed(): boolean {
        return this.disposed;
    }

    get size(): number {
        return this.items.length;
    }

    /**
     * Adds a disposable. If the bag has already been disposed the item is released immediately.
     */
    add(item: Disposable): void {
        if (this.disposed) {
            item.dispose();
            return;
        }
        this.items.push(item);
    }

    dispose(): void {
        if (this.disposed) return;
        this.disposed = true;
        const items = this.items;
        this.items = [];
        for (const item of items) {
            item.dispose();
        }
    }
}
