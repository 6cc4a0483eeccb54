import { describe, it, expect, vi } from 'vitest';
import { createAnalysisConfig } from '../analysisConfig';
import { runBatch } from '../batchRunner';
import { BatchTooLargeError, EmptyBatchError, ErrorCode, UnsupportedAnalysisTypeError } from '../errors';

const config = createAnalysisConfig();

describe('runBatch', () => {
    it('isolates a failing item', () => {
        const batch = runBatch(['I love this!', '', 'Terrible!'], 'sentiment', config);

        expect(batch.totalItems).toBe(3);
        expect(batch.successfulItems).toBe(2);
        expect(batch.failedItems).toBe(1);
        expect(batch.results).toMatchObject([
            { success: true, result: { label: 'positive' }, metadata: { itemIndex: 0 } },
            { success: false, errorCode: ErrorCode.INVALID_INPUT, metadata: { itemIndex: 1 } },
            { success: true, result: { label: 'negative' }, metadata: { itemIndex: 2 } },
        ]);
    });

    it('summarizes sentiment results', () => {
        const { summary } = runBatch(['I love this!', '', 'Terrible!'], 'sentiment', config);

        expect(summary.successRate).toBeCloseTo(2 / 3, 10);
        expect(summary.averageContentLength).toBe(10.5);
        expect(summary.sentimentDistribution).toEqual({ positive: 1, negative: 1 });
        expect(summary.averageConfidence).toBeCloseTo(0.6, 10);
        expect(summary.averageScore).toBeCloseTo(-1 / 3, 10);
    });

    it('summarizes word counts for text statistics', () => {
        const batch = runBatch(['hello world', 42], 'text', config);

        expect(batch.results[1]).toMatchObject({
            success: false,
            error: 'Content must be text or bytes',
            errorCode: ErrorCode.INVALID_INPUT,
        });
        expect(batch.summary).toMatchObject({ averageWordCount: 2, totalWords: 2, successRate: 0.5 });
    });

    it('summarizes word counts for comprehensive reports', () => {
        expect(runBatch(['one two', 'three'], 'comprehensive', config).summary).toMatchObject({
            averageWordCount: 1.5,
            totalWords: 3,
        });
    });

    it('summarizes detected formats', () => {
        const { summary } = runBatch(['{"a":1}', 'a,b\n1,2', 'plain words'], 'data_format', config);

        expect(summary.formatDistribution).toEqual({ json: 1, csv: 1, text: 1 });
    });

    it('returns a minimal summary when every item fails', () => {
        expect(runBatch(['', '  '], 'sentiment', config).summary).toEqual({
            successRate: 0,
            averageContentLength: 0,
        });
    });

    it('measures byte items in bytes', () => {
        const batch = runBatch([new Uint8Array([0xff, 0xfe, 0xfd]), Buffer.from('two words')], 'text', config);

        expect(batch.results).toMatchObject([
            { success: false, errorCode: ErrorCode.INVALID_INPUT, metadata: { contentLength: 3, itemIndex: 0 } },
            { success: true, metadata: { contentLength: 9, itemIndex: 1 } },
        ]);
    });

    it('reports every item to the callback in order', () => {
        const onItem = vi.fn();
        runBatch(['a', 'b', ''], 'text', config, { onItem });

        expect(onItem).toHaveBeenCalledTimes(3);
        expect(onItem.mock.calls.map(call => call[1])).toEqual([0, 1, 2]);
    });

    it('rejects an empty batch before checking the analysis type', () => {
        expect(() => runBatch([], 'bogus', config)).toThrow(EmptyBatchError);
        expect(() => runBatch([], 'sentiment', config)).toThrow('Batch must contain at least one item');
    });

    it('rejects a batch over the size limit', () => {
        const small = createAnalysisConfig({ limits: { maxBatchSize: 2 } });

        expect(() => runBatch(['a', 'b', 'c'], 'sentiment', small)).toThrow(BatchTooLargeError);
        expect(() => runBatch(['a', 'b', 'c'], 'sentiment', small)).toThrow('Batch too large (3 items, max 2)');
    });

    it('rejects an unknown analysis type', () => {
        expect(() => runBatch(['a'], 'bogus', config)).toThrow(UnsupportedAnalysisTypeError);
    });
});
