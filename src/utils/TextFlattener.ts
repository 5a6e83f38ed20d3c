import {Logger} from "loglevel";
import {DomWrapper} from "./DomWrapper";
import {isElement, TEXT_NODE} from "./misc";

const blockLikeDisplays = new Set([
    // Basic block elements
    'block', 'flow-root', 'inline-block',
    // Lists
    'list-item',
    // Table elements
    'table', 'inline-table', 'table-row', 'table-cell',
    'table-caption', 'table-header-group', 'table-footer-group',
    'table-row-group',
    // Modern layouts
    'flex', 'inline-flex', 'grid', 'inline-grid'
]);

const lineBreakMarker = '\n';

/**
 * builds the human/model-readable label of an element out of its visible descendant text
 */
export class TextFlattener {
    private domHelper: DomWrapper;
    readonly logger: Logger;

    constructor(domHelper: DomWrapper, logger: Logger) {
        this.domHelper = domHelper;
        this.logger = logger;
    }

    private isHiddenByStyle(element: Element): boolean {
        const style = this.domHelper.getComputedStyle(element);
        return style.display === 'none' || style.visibility === 'hidden';
    }

    /**
     * @description Get the visible text of an element, without the text of any nested elements that are marked as
     * interactive in their own right
     * @param element the element whose label is needed
     * @param markedElements elements that get their own marks in the current pass; descent stops at any of them
     *                        (other than the element itself)
     * @return normalized text: fragments joined with single spaces, runs of whitespace collapsed, trimmed
     */
    getVisibleText = (element: Element, markedElements: ReadonlySet<Element> = new Set()): string => {
        if (this.isHiddenByStyle(element)) {
            return '';
        }
        const collectedText: string[] = [];

        const traverse = (node: Node): void => {
            if (node.nodeType === TEXT_NODE) {
                const trimmed = (node.textContent ?? '').trim();
                if (trimmed) {collectedText.push(trimmed);}
                return;
            }
            if (!isElement(node)) {return;}
            const elem = node;

            if (elem !== element && markedElements.has(elem)) {return;}
            if (elem.tagName === 'NOSCRIPT') {return;}

            const display = this.domHelper.getComputedStyle(elem).display;
            if (elem !== element && this.isHiddenByStyle(elem)) {return;}

            const isBlockLike = blockLikeDisplays.has(display);
            if (isBlockLike && collectedText.length > 0) {collectedText.push(lineBreakMarker);}

            if (elem.tagName === 'IMG') {
                const imgToken = this.describeImage(elem);
                if (imgToken) {collectedText.push(imgToken);}
                return;
            }

            elem.childNodes.forEach(child => traverse(child));

            if (isBlockLike) {collectedText.push(lineBreakMarker);}
        };

        traverse(element);

        return collectedText.join(' ').trim().replace(/\s{2,}/g, ' ').trim();
    }

    /**
     * @return a bracketed token like [img - alt="..." title="..."], or null if the image has none of the label
     *          attributes
     */
    describeImage = (img: Element): string | null => {
        const textParts: string[] = [];
        const alt = img.getAttribute('alt');
        const title = img.getAttribute('title');
        const ariaLabel = img.getAttribute('aria-label');

        if (alt) {textParts.push(`alt="${alt}"`);}
        if (title) {textParts.push(`title="${title}"`);}
        if (ariaLabel) {textParts.push(`aria-label="${ariaLabel}"`);}

        return textParts.length > 0 ? `[img - ${textParts.join(' ')}]` : null;
    }
}
