import {v4 as uuidV4} from "uuid";

/**
 * maps the mark indices of the most recent extraction pass back to the elements they were made from
 * Each pass replaces the previous one wholesale; indices from an earlier pass never resolve
 */
export class MarkRegistry {
    private elementsByIndex: Element[] = [];
    private currPassId: string | undefined;

    get passId(): string | undefined {return this.currPassId;}

    get size(): number {return this.elementsByIndex.length;}

    /**
     * discard the previous pass's entries
     * @return the id of the new pass
     */
    startPass = (): string => {
        this.elementsByIndex = [];
        this.currPassId = uuidV4();
        return this.currPassId;
    }

    /**
     * @return the index assigned to the element's new mark (indices are handed out contiguously from 0)
     */
    register = (element: Element): number => {
        this.elementsByIndex.push(element);
        return this.elementsByIndex.length - 1;
    }

    /**
     * @param index the mark index chosen by the caller
     * @param passId if given, the pass that the index came from; a mismatch with the current pass yields null
     */
    resolve = (index: number, passId?: string): Element | null => {
        if (passId !== undefined && passId !== this.currPassId) {return null;}
        if (!Number.isInteger(index) || index < 0 || index >= this.elementsByIndex.length) {return null;}
        return this.elementsByIndex[index];
    }
}
