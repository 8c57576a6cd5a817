export interface SourcePosition {
    /** 1-based */
    line: number;
    /** 1-based, in UTF-16 code units */
    column: number;
}

/**
 * Maps string offsets to line/column positions. Line starts are collected
 * once; lookups search them.
 */
export class LineCounter {
    private readonly lineStarts: number[] = [0];

    constructor(content: string) {
        for (const match of content.matchAll(/\n/g)) {
            this.lineStarts.push((match.index ?? 0) + 1);
        }
    }

    /** Index of the last line start at or before the offset. */
    private lineIndex(offset: number): number {
        let low = 0;
        let high = this.lineStarts.length;
        while (high - low > 1) {
            const mid = (low + high) >>> 1;
            if (this.lineStarts[mid] <= offset) low = mid;
            else high = mid;
        }
        return low;
    }

    public getLineNumber(offset: number): number {
        return offset < 0 ? 1 : this.lineIndex(offset) + 1;
    }

    public locate(offset: number): SourcePosition {
        const clamped = Math.max(0, offset);
        const index = this.lineIndex(clamped);
        return { line: index + 1, column: clamped - this.lineStarts[index] + 1 };
    }

    public get lineCount(): number {
        return this.lineStarts.length;
    }
}
