import type {DOMWindow} from "jsdom";
import {ClientRectLike, isHtmlElement, ScrollMetrics, ViewportDetails} from "./misc";

/**
 * @description class with thin wrappers around DOM interaction
 * This is a class so that it can be mocked in unit tests (jsdom does no layout, so every geometry, style, and
 * hit-testing read has to be supplied by the test)
 * It should never have any mutable state
 */
export class DomWrapper {
    readonly dom: Document;
    readonly window: Window | DOMWindow;

    constructor(windowToUse: Window | DOMWindow) {
        const {document} = windowToUse;

        this.dom = document;
        this.window = windowToUse;
    }

    /**
     * primitive wrapper around querySelectorAll to find elements in the DOM (doesn't pierce shadow roots or iframes)
     * @param cssSelector The CSS selector to use to find elements
     * @param overrideRoot the element, secondary document, or shadow root that should be searched through (instead
     *                      of the main document of the page)
     * @returns array of elements that match the CSS selector;
     *           this is a static view of the elements (not live access that would allow modification)
     */
    fetchElementsByCss = (cssSelector: string, overrideRoot?: Document | ShadowRoot | Element): Array<Element> => {
        return Array.from((overrideRoot ?? this.dom).querySelectorAll(cssSelector));
    }

    /**
     * trivial wrapper around window.getComputedStyle because jsdom's support for it is partial and so it has to be
     * mocked in unit tests
     * @param element the element whose computed style is needed
     * @returns the computed style of the element
     */
    getComputedStyle = (element: Element): CSSStyleDeclaration => {
        //elements from a same-origin iframe have to be styled by that iframe's own window
        const owningWindow = element.ownerDocument.defaultView ?? this.window;
        return owningWindow.getComputedStyle(element);
    }

    /**
     * trivial wrapper around element.getBoundingClientRect() because jsdom doesn't properly support that function
     * (all numbers are 0's) and so it has to be mocked in unit tests
     * @param element the element to grab the bounding rect of
     * @returns the bounding rect of the element
     */
    grabClientBoundingRect = (element: Element): ClientRectLike => {
        return element.getBoundingClientRect();
    }

    /**
     * wrapper around element.getClientRects(); an inline element that wraps across lines has one rect per line fragment
     * @param element the element whose fragment rects are needed
     */
    grabClientRects = (element: Element): ClientRectLike[] => {
        return Array.from(element.getClientRects());
    }

    /**
     * rendered (layout) width and height; non-HTML elements (e.g. svg) have no offset dimensions and report 0
     */
    getOffsetSize = (element: Element): { width: number, height: number } => {
        if (isHtmlElement(element)) {
            return {width: element.offsetWidth, height: element.offsetHeight};
        }
        return {width: 0, height: 0};
    }

    getScrollMetrics = (element: Element): ScrollMetrics => {
        return {
            scrollWidth: element.scrollWidth, scrollHeight: element.scrollHeight,
            clientWidth: element.clientWidth, clientHeight: element.clientHeight
        };
    }

    /**
     * hit-test within a given context; the coordinates are relative to that context's own viewport (i.e. an iframe's
     * document is hit-tested in the iframe's coordinate space)
     * @param x horizontal coordinate
     * @param y vertical coordinate
     * @param overrideRoot the secondary document or shadow root that should be hit-tested (instead of the main document)
     */
    elementFromPoint = (x: number, y: number, overrideRoot?: Document | ShadowRoot): Element | null => {
        return (overrideRoot ?? this.dom).elementFromPoint(x, y);
    }

    /**
     * provides information about the viewport
     */
    getViewportInfo = (): ViewportDetails => {
        const docElem = this.dom.documentElement;
        return {
            width: Math.max(docElem.clientWidth || 0, this.window.innerWidth || 0),
            height: Math.max(docElem.clientHeight || 0, this.window.innerHeight || 0),
            scrollX: this.window.scrollX,
            scrollY: this.window.scrollY
        }
    }

    /**
     * @description trivial wrapper around document.documentElement to allow jsdom-based unit tests to work
     * @return the document element
     */
    getDocumentElement = (): HTMLElement => {
        return this.dom.documentElement;
    }

    getUrl = (): string => {
        return this.dom.URL;
    }
}
