import {Logger} from "loglevel";
import {DomWrapper} from "./DomWrapper";
import {isShadowRoot, renderElement, renderUnknownValue} from "./misc";

export class VisibilityFilter {
    private domHelper: DomWrapper;
    readonly logger: Logger;

    constructor(domHelper: DomWrapper, logger: Logger) {
        this.domHelper = domHelper;
        this.logger = logger;
    }

    /**
     * @description whether the element is actually rendered: non-zero layout size, and not hidden through the
     * visibility or display properties
     */
    isVisible = (element: Element): boolean => {
        const {width, height} = this.domHelper.getOffsetSize(element);
        if (width <= 0 || height <= 0) {return false;}
        const style = this.domHelper.getComputedStyle(element);
        return style.visibility !== 'hidden' && style.display !== 'none';
    }

    /**
     * @description whether the element is the topmost hit-test target at the center of its own bounding box, i.e.
     * whether it isn't fully covered there by something unrelated
     * Elements inside an iframe's document are always treated as topmost (occlusion of the iframe's contents by the
     * outer page isn't modelled).
     * Any failure while reading geometry or hit-testing (e.g. the element was detached mid-scan) counts as topmost.
     */
    isTopmost = (element: Element): boolean => {
        if (element.ownerDocument !== this.domHelper.dom) {
            return true;
        }
        try {
            const rootNode = element.getRootNode();
            const rect = this.domHelper.grabClientBoundingRect(element);
            const centerX = rect.left + rect.width / 2;
            const centerY = rect.top + rect.height / 2;
            if (isShadowRoot(rootNode)) {
                const topElem = this.domHelper.elementFromPoint(centerX, centerY, rootNode);
                return this.isReachedBeforeContextRoot(element, topElem, null);
            }
            const topElem = this.domHelper.elementFromPoint(centerX, centerY);
            return this.isReachedBeforeContextRoot(element, topElem, this.domHelper.getDocumentElement());
        } catch (error: unknown) {
            this.logger.debug(`error while hit-testing element ${renderElement(element, 100)}, treating it as topmost: ${renderUnknownValue(error).slice(0, 200)}`);
            return true;
        }
    }

    /**
     * walk up from the hit-test result; accept if the element itself is reached before the context root
     * (parentElement is already null at the top of a shadow tree, so a shadow context passes null as its stop node)
     */
    private isReachedBeforeContextRoot(element: Element, hitElement: Element | null, contextRoot: Element | null
    ): boolean {
        let current: Element | null = hitElement;
        while (current && current !== contextRoot) {
            if (current === element) {return true;}
            current = current.parentElement;
        }
        return false;
    }
}
