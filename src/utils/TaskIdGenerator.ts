export interface ParsedSegmentId {
    baseId: string;
    segmentDate: string;
}

const SEGMENT_ID_REGEX = /^(.*)##seg:(\d{4}-\d{2}-\d{2})$/;

export class TaskIdGenerator {
    static makeGroupId(index: number): string {
        return `group_${index}`;
    }

    static makeSegmentId(baseId: string, segmentDate: string): string {
        return `${baseId}##seg:${segmentDate}`;
    }

    static parseSegmentId(id: string): ParsedSegmentId | null {
        const match = id.match(SEGMENT_ID_REGEX);
        if (!match) {
            return null;
        }

        return {
            baseId: match[1],
            segmentDate: match[2],
        };
    }

    /** Task id behind a bar or segment id. */
    static getBaseId(id: string): string {
        return this.parseSegmentId(id)?.baseId ?? id;
    }
}
