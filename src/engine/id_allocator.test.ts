import { describe, expect, it } from 'vitest';
import { BatchContext, IdAllocator, applicantNumber } from './id_allocator';

describe('applicantNumber', () => {
    it('reads the numeric suffix of valid ids only', () => {
        expect(applicantNumber('A105')).toBe(105n);
        expect(applicantNumber('B105')).toBeNull();
    });
});

describe('IdAllocator', () => {
    it('starts at A101 when nothing has been seen', () => {
        const allocator = new IdAllocator(new BatchContext());
        expect(allocator.allocateNext()).toBe('A101');
        expect(allocator.allocateNext()).toBe('A102');
    });

    it('never returns the same id twice in a batch', () => {
        const allocator = new IdAllocator(new BatchContext(), ['A300']);
        const first = allocator.allocateNext();
        const second = allocator.allocateNext();
        expect(first).not.toBe(second);
        expect([first, second]).toEqual(['A301', 'A302']);
    });

    it('allocates above both the store and the batch', () => {
        const batch = new BatchContext();
        batch.register('A106');
        const allocator = new IdAllocator(batch, ['A101', 'A105']);

        expect(allocator.allocateNext()).toBe('A107');
    });

    it('ignores malformed store ids', () => {
        const allocator = new IdAllocator(new BatchContext(), ['X9', 'A7', '']);
        expect(allocator.allocateNext()).toBe('A8');
    });

    it('keeps counting past the largest safe integer', () => {
        const batch = new BatchContext();
        batch.register('A9007199254740992');
        const allocator = new IdAllocator(batch, ['A12345678901234567890']);

        expect(allocator.allocateNext()).toBe('A12345678901234567891');
        expect(allocator.allocateNext()).toBe('A12345678901234567892');
    });

    it('starts over once the batch is cleared', () => {
        const batch = new BatchContext();
        const allocator = new IdAllocator(batch);
        allocator.allocateNext();
        allocator.allocateNext();

        batch.clear();
        expect(allocator.allocateNext()).toBe('A101');
    });
});

describe('BatchContext.register', () => {
    it('rejects values that are not applicant ids', () => {
        const batch = new BatchContext();
        expect(batch.register('B12')).toBe(false);
        expect(batch.register('A12')).toBe(true);
        expect(batch.has(12n)).toBe(true);
    });
});
