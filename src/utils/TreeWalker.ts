import {Logger} from "loglevel";
import {DomWrapper} from "./DomWrapper";
import {InteractivityClassifier} from "./InteractivityClassifier";
import {VisibilityFilter} from "./VisibilityFilter";
import {calculateArea, GeometryResolver} from "./GeometryResolver";
import {
    ClientRectLike, isElement, isIframeElement, isSecurityError, isShadowRoot, isSlotElement, PointOffset, renderElement,
    renderUnknownValue
} from "./misc";
import {Candidate, TraversalContext} from "./mark_defs";

/**
 * the ways in which an element can contain further elements that the walker must visit
 * an element's shadow root (if any) is always visited; after that exactly one of the other kinds applies
 */
type Containment =
    | { kind: "shadowRoot", shadowRoot: ShadowRoot }
    | { kind: "slot", slot: HTMLSlotElement }
    | { kind: "iframe", iframe: HTMLIFrameElement }
    | { kind: "children", element: Element };

type ContainmentHandler<K extends Containment["kind"]> =
    (containment: Extract<Containment, { kind: K }>, context: TraversalContext) => void;

export class TreeWalker {
    private domHelper: DomWrapper;
    private classifier: InteractivityClassifier;
    private visibilityFilter: VisibilityFilter;
    private geometryResolver: GeometryResolver;
    readonly logger: Logger;

    constructor(domHelper: DomWrapper, classifier: InteractivityClassifier, visibilityFilter: VisibilityFilter,
                geometryResolver: GeometryResolver, logger: Logger) {
        this.domHelper = domHelper;
        this.classifier = classifier;
        this.visibilityFilter = visibilityFilter;
        this.geometryResolver = geometryResolver;
        this.logger = logger;
    }

    /**
     * @description depth-first, pre-order scan for candidate elements, piercing shadow roots, slots, and same-origin
     * iframes
     * @param scanRoot optional subtree to restrict the scan to (defaults to the top document's root element)
     * @return the candidates in the order they were recorded
     */
    walk = (scanRoot?: Element): Candidate[] => {
        const isScanRootGiven = scanRoot !== undefined;
        const startElement = scanRoot ?? this.domHelper.getDocumentElement();
        const candidates: Candidate[] = [];
        const recordedElements = new Set<Element>();

        const visit = (element: Element, context: TraversalContext): void => {
            try {
                //slotted light-DOM children are reachable both through the slot and through their host's children
                if (!recordedElements.has(element) && this.isCandidate(element, isScanRootGiven)) {
                    const rects = this.geometryResolver.getRects(element, context);
                    candidates.push({
                        element, context, rects, area: calculateArea(rects),
                        isScrollable: this.classifier.isScrollable(element, isScanRootGiven)
                    });
                    recordedElements.add(element);
                }
            } catch (error: unknown) {
                this.logger.warn(`error while evaluating element ${renderElement(element, 100)}, treating it as a non-candidate: ${renderUnknownValue(error)}`);
            }
            this.determineContainments(element).forEach(containment => {
                try {
                    this.dispatch(containment, context, visit);
                } catch (error: unknown) {
                    this.logger.warn(`error while descending into ${containment.kind} of element ${renderElement(element, 100)}, skipping that content: ${renderUnknownValue(error)}`);
                }
            });
        };

        visit(startElement, this.determineStartContext(startElement));
        this.logger.debug(`scan found ${candidates.length} candidate elements`);
        return candidates;
    }

    private isCandidate(element: Element, isScanRootGiven: boolean): boolean {
        return this.classifier.isInteractive(element, isScanRootGiven) && this.visibilityFilter.isVisible(element)
            && this.visibilityFilter.isTopmost(element);
    }

    private determineStartContext(startElement: Element): TraversalContext {
        const startDoc = startElement.ownerDocument;
        let iframeOffset: PointOffset = {x: 0, y: 0};
        if (startDoc !== this.domHelper.dom) {
            const frameOffset = this.findFrameOffset(startDoc, this.domHelper.dom, {x: 0, y: 0});
            if (frameOffset) {
                iframeOffset = frameOffset;
            } else {
                this.logger.warn(`scan root ${renderElement(startElement, 100)} is in a document that isn't reachable through the page's same-origin iframes; treating its coordinates as top-level`);
            }
        }
        const rootNode = startElement.getRootNode();
        if (isShadowRoot(rootNode)) {
            return {kind: "shadowRoot", root: rootNode, iframeOffset};
        }
        if (startDoc !== this.domHelper.dom) {
            return {kind: "iframeDocument", root: startDoc, iframeOffset};
        }
        return {kind: "document", root: this.domHelper.dom, iframeOffset};
    }

    /**
     * @description search the same-origin iframes (including ones in shadow roots and nested frames) under a scope for
     * the one that hosts the target document
     * @return the accumulated offset of that iframe's document relative to the top-level viewport, or null if the
     *          target document isn't hosted under the scope
     */
    private findFrameOffset(targetDoc: Document, scope: Document | ShadowRoot, scopeOffset: PointOffset
    ): PointOffset | null {
        for (const elem of this.domHelper.fetchElementsByCss("*", scope)) {
            if (elem.shadowRoot) {
                const offsetFromShadowRoot = this.findFrameOffset(targetDoc, elem.shadowRoot, scopeOffset);
                if (offsetFromShadowRoot) {return offsetFromShadowRoot;}
            }
            if (!isIframeElement(elem)) {continue;}
            const frameDoc = this.getIframeContent(elem);
            const frameRect = frameDoc ? this.grabIframeRect(elem) : null;
            if (!frameDoc || !frameRect) {continue;}
            const frameOffset = {x: scopeOffset.x + frameRect.left, y: scopeOffset.y + frameRect.top};
            if (frameDoc === targetDoc) {return frameOffset;}
            const nestedOffset = this.findFrameOffset(targetDoc, frameDoc, frameOffset);
            if (nestedOffset) {return nestedOffset;}
        }
        return null;
    }

    private determineContainments(element: Element): Containment[] {
        const containments: Containment[] = [];
        if (element.shadowRoot) {
            containments.push({kind: "shadowRoot", shadowRoot: element.shadowRoot});
        }
        if (isSlotElement(element)) {
            containments.push({kind: "slot", slot: element});
        } else if (isIframeElement(element)) {
            containments.push({kind: "iframe", iframe: element});
        } else {
            containments.push({kind: "children", element});
        }
        return containments;
    }

    private dispatch(containment: Containment, context: TraversalContext,
                     visit: (element: Element, context: TraversalContext) => void): void {
        const handlers: { [K in Containment["kind"]]: ContainmentHandler<K> } = {
            shadowRoot: ({shadowRoot}, ctx) => {
                const shadowContext: TraversalContext = {kind: "shadowRoot", root: shadowRoot, iframeOffset: ctx.iframeOffset};
                Array.from(shadowRoot.childNodes).filter(isElement).forEach(child => visit(child, shadowContext));
            },
            slot: ({slot}, ctx) => {
                slot.assignedNodes().filter(isElement).forEach(child => visit(child, ctx));
            },
            iframe: ({iframe}, ctx) => {
                const iframeDoc = this.getIframeContent(iframe);
                if (!iframeDoc?.body) {return;}
                const iframeRect = this.grabIframeRect(iframe);
                if (!iframeRect) {return;}
                const iframeContext: TraversalContext = {
                    kind: "iframeDocument", root: iframeDoc,
                    iframeOffset: {x: ctx.iframeOffset.x + iframeRect.left, y: ctx.iframeOffset.y + iframeRect.top}
                };
                visit(iframeDoc.body, iframeContext);
            },
            children: ({element}, ctx) => {
                Array.from(element.children).forEach(child => visit(child, ctx));
            }
        };
        switch (containment.kind) {
            case "shadowRoot": handlers.shadowRoot(containment, context); break;
            case "slot": handlers.slot(containment, context); break;
            case "iframe": handlers.iframe(containment, context); break;
            case "children": handlers.children(containment, context); break;
        }
    }

    private grabIframeRect(iframe: HTMLIFrameElement): ClientRectLike | null {
        try {
            return this.domHelper.grabClientBoundingRect(iframe);
        } catch (error: unknown) {
            this.logger.debug(`unable to read position of iframe ${renderElement(iframe, 100)}, skipping its contents: ${renderUnknownValue(error).slice(0, 200)}`);
            return null;
        }
    }

    /**
     * @return the iframe's document, or null if it can't be accessed (e.g. because the iframe is cross-origin)
     */
    getIframeContent = (iframe: HTMLIFrameElement): Document | null => {
        try {
            return iframe.contentDocument || iframe.contentWindow?.document || null;
        } catch (error: unknown) {
            if (isSecurityError(error)) {
                this.logger.debug(`Cross-origin (${iframe.src}) iframe detected while grabbing iframe content: ${
                    renderUnknownValue(error).slice(0, 100)}`);
            } else {
                this.logger.error(`Error grabbing iframe content: ${renderUnknownValue(error)}`);
            }
            return null;
        }
    }
}
