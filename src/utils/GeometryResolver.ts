import {Logger} from "loglevel";
import {DomWrapper} from "./DomWrapper";
import {ClientRectLike, renderElement, renderUnknownValue} from "./misc";
import {MarkRect, TraversalContext} from "./mark_defs";

export function calculateArea(rects: MarkRect[]): number {
    return rects.reduce((acc, rect) => acc + rect.width * rect.height, 0);
}

/**
 * computes the visible, un-occluded, viewport-clipped rectangles of an element in top-level viewport coordinates
 */
export class GeometryResolver {
    private domHelper: DomWrapper;
    readonly logger: Logger;

    constructor(domHelper: DomWrapper, logger: Logger) {
        this.domHelper = domHelper;
        this.logger = logger;
    }

    /**
     * @param element the candidate element
     * @param context the document/shadow root that the element was found in; hit-tests happen there, in that
     *                 context's own coordinate space
     * @return one rect per surviving client rect (an inline element wrapped across lines can have several);
     *          rects entirely outside the viewport are dropped, but rects that clip to zero area are kept
     */
    getRects = (element: Element, context: TraversalContext): MarkRect[] => {
        const {width: viewportWidth, height: viewportHeight} = this.domHelper.getViewportInfo();

        let rawRects: ClientRectLike[] = this.domHelper.grabClientRects(element);
        //shadow-DOM-hosted content frequently reports no fragment rects
        if (rawRects.length === 0) {
            rawRects = [this.domHelper.grabClientBoundingRect(element)];
        }
        const {x: offsetX, y: offsetY} = context.iframeOffset;

        return rawRects.filter(rawRect => this.isRectUncovered(element, rawRect, context))
            .map(rawRect => ({
                left: rawRect.left + offsetX, top: rawRect.top + offsetY,
                right: rawRect.right + offsetX, bottom: rawRect.bottom + offsetY
            }))
            .filter(translated => {
                //contents of an iframe that is scrolled out of view pass the in-frame hit-test
                const isInViewport = translated.right > 0 && translated.left < viewportWidth
                    && translated.bottom > 0 && translated.top < viewportHeight;
                if (!isInViewport) {
                    this.logger.trace(`dropping rect of element ${renderElement(element, 100)} that lies outside the viewport`);
                }
                return isInViewport;
            })
            .map(translated => {
                const left = Math.max(0, translated.left);
                const top = Math.max(0, translated.top);
                const right = Math.min(viewportWidth, translated.right);
                const bottom = Math.min(viewportHeight, translated.bottom);
                return {left, top, right, bottom, width: right - left, height: bottom - top};
            });
    }

    private isRectUncovered(element: Element, rawRect: ClientRectLike, context: TraversalContext): boolean {
        //the rect is still in the context's own coordinate space here, so the hit-test needs no offset
        const centerX = rawRect.left + rawRect.width / 2;
        const centerY = rawRect.top + rawRect.height / 2;
        try {
            const elemAtCenter = this.domHelper.elementFromPoint(centerX, centerY, context.root);
            return elemAtCenter === element || (elemAtCenter !== null && element.contains(elemAtCenter));
        } catch (error: unknown) {
            this.logger.debug(`hit-test failed at (${centerX}, ${centerY}) for element ${renderElement(element, 100)}; keeping that rect: ${renderUnknownValue(error).slice(0, 200)}`);
            return true;
        }
    }
}
