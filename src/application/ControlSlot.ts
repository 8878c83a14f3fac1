/**
 * One-slot mailbox between the command flow and the audio delivery flow.
 * A newer request replaces an unconsumed older one.
 */
export class ControlSlot<T> {
    private value: T | undefined;
    private filled: boolean = false;

    put(value: T): void {
        this.value = value;
        this.filled = true;
    }

    peek(): T | undefined {
        return this.filled ? this.value : undefined;
    }

    take(): T | undefined {
        if (!this.filled) {
            return undefined;
        }
        const value = this.value;
        this.clear();
        return value;
    }

    clear(): void {
        this.value = undefined;
        this.filled = false;
    }
}
