import { validId } from './field_registry';

const FIRST_APPLICANT_NUMBER = 101n;

// bigint: `A<digits>` has no length limit
export function applicantNumber(id: string): bigint | null {
    return validId(id) ? BigInt(id.trim().slice(1)) : null;
}

function maxOf(numbers: Iterable<bigint>): bigint | null {
    let highest: bigint | null = null;
    for (const n of numbers) {
        if (highest === null || n > highest) highest = n;
    }
    return highest;
}

/**
 * Identifier numbers allocated or observed while one batch is in flight.
 * Created fresh (or cleared) at batch start; never persisted.
 */
export class BatchContext {
    private readonly used = new Set<bigint>();

    clear(): void {
        this.used.clear();
    }

    /**
     * Records an identifier seen in the input. Returns false when the value is not an applicant id.
     */
    register(id: string): boolean {
        const n = applicantNumber(id);
        if (n === null) return false;
        this.used.add(n);
        return true;
    }

    registerNumber(n: bigint): void {
        this.used.add(n);
    }

    has(n: bigint): boolean {
        return this.used.has(n);
    }

    highest(): bigint | null {
        return maxOf(this.used);
    }
}

/**
 * Issues `A<n>` identifiers that collide with neither the store snapshot nor the batch.
 *
 * The store snapshot is taken once per batch (see `seedFromStore` in the orchestrator);
 * `allocateNext` and `BatchContext.register` are synchronous, so allocations within a
 * process never interleave.
 */
export class IdAllocator {
    private readonly storeNumbers: Set<bigint>;

    constructor(private readonly batch: BatchContext, storeIds: Iterable<string> = []) {
        const numbers = new Set<bigint>();
        for (const id of storeIds) {
            const n = applicantNumber(id);
            if (n !== null) numbers.add(n);
        }
        this.storeNumbers = numbers;
    }

    allocateNext(): string {
        const highest = maxOf([maxOf(this.storeNumbers), this.batch.highest()].filter((n): n is bigint => n !== null));

        let next = highest === null ? FIRST_APPLICANT_NUMBER : highest + 1n;
        while (this.storeNumbers.has(next) || this.batch.has(next)) next++;

        this.batch.registerNumber(next);
        return `A${next}`;
    }
}
