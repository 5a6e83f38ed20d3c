import {Logger} from "loglevel";
import {TextFlattener} from "./TextFlattener";
import {MarkRegistry} from "./MarkRegistry";
import {Candidate, ElementDescription, Mark} from "./mark_defs";
import {renderElement, renderUnknownValue} from "./misc";

/**
 * the string value of form controls (input, textarea, select, button, option, ...), or null for anything else
 */
export function getElementValue(element: Element): string | null {
    if ('value' in element && typeof element.value === "string") {
        return element.value;
    }
    return null;
}

export class MarkAssembler {
    private textFlattener: TextFlattener;
    readonly logger: Logger;

    constructor(textFlattener: TextFlattener, logger: Logger) {
        this.textFlattener = textFlattener;
        this.logger = logger;
    }

    /**
     * expand each candidate into one mark per surviving rectangle, registering every mark's element in the registry
     * (which must already have been reset for this pass)
     * @param candidates the walker's output, in traversal order
     * @param registry the registry for the current pass
     */
    assemble = (candidates: Candidate[], registry: MarkRegistry): Mark[] => {
        const markedElements: ReadonlySet<Element> = new Set(candidates.map(candidate => candidate.element));
        const marks: Mark[] = [];
        for (const candidate of candidates) {
            if (candidate.rects.length === 0) {
                this.logger.trace(`candidate element ${renderElement(candidate.element, 100)} has no uncovered rects, so it gets no mark`);
                continue;
            }
            const description = this.describe(candidate, markedElements);
            for (const rect of candidate.rects) {
                const index = registry.register(candidate.element);
                marks.push({
                    index,
                    centroid: {x: Math.round((rect.left + rect.right) / 2), y: Math.round((rect.top + rect.bottom) / 2)},
                    rect,
                    description
                });
            }
        }
        return marks;
    }

    describe = (candidate: Candidate, markedElements: ReadonlySet<Element>): ElementDescription => {
        const element = candidate.element;
        let text = "";
        try {
            text = this.textFlattener.getVisibleText(element, markedElements);
        } catch (error: unknown) {
            this.logger.warn(`unable to flatten text of element ${renderElement(element, 100)}, leaving its label empty: ${renderUnknownValue(error)}`);
        }
        return {
            tag: element.tagName,
            text,
            value: getElementValue(element),
            placeholder: element.getAttribute("placeholder"),
            element_type: element.getAttribute("type"),
            aria_label: element.getAttribute("aria-label"),
            name: element.getAttribute("name"),
            required: element.getAttribute("required"),
            disabled: element.getAttribute("disabled"),
            pattern: element.getAttribute("pattern"),
            checked: element.getAttribute("checked"),
            minlength: element.getAttribute("minlength"),
            maxlength: element.getAttribute("maxlength"),
            role: element.getAttribute("role"),
            title: element.getAttribute("title"),
            scrollable: candidate.isScrollable
        };
    }
}
