/**
 * A stored record whose verbatim payload can no longer be decoded
 */
export class MalformedRecordError extends Error {
    public readonly recordId: number;

    constructor(recordId: number, detail: string) {
        super(`History record ${recordId} has a malformed payload: ${detail}`);
        this.name = 'MalformedRecordError';
        this.recordId = recordId;
    }
}
