import type { Disposable } from "./dispose-bag";

export type Listener<T> = (value: T) => void;

/**
 * Publish-only broadcast stream. Keeps no history: subscribers only see values published after
 * they subscribed. Delivery is synchronous, in subscription order.
 */
export class OutputChannel<T> {
    private listeners: Listener<T>[] = [];

    constructor(readonly name: string) {}

    get subscriberCount(): number {
        return this.listeners.length;
    }

    subscribe(listener: Listener<T>): Disposable {
        // Wrap so the same function can be subscribed twice and removed independently.
        const entry: Listener<T> = value => listener(value);
        this.listeners = [...this.listeners, entry];

        let active = true;
        return {
            dispose: () => {
                if (!active) return;
                active = false;
                this.listeners = this.listeners.filter(l => l !== entry);
            },
        };
    }

    /**
     * Listener errors are not caught here; they reach the publisher's caller.
     */
    publish(value: T): void {
        const snapshot = this.listeners;
        for (const listener of snapshot) {
            // Skip listeners disposed by an earlier listener during this publish.
            if (!this.listeners.includes(listener)) continue;
            listener(value);
        }
    }
}

/**
 * Wraps a listener so it only holds its owner weakly. Once the owner is collected, or
 * `isTornDown` reports it gone, dispatch is a no-op.
 */
export function bindToOwner<O extends object, T>(
    owner: O,
    handler: (owner: O, value: T) => void,
    isTornDown?: (owner: O) => boolean
): Listener<T> {
    const ref = new WeakRef(owner);
    return value => {
        const current = ref.deref();
        if (!current || isTornDown?.(current)) return;
        handler(current, value);
    };
}
