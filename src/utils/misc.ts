//id of the single synthetic dropdown container that the select overlay creates in each document
export const customSelectOverlayId = "page-marks-custom-select";
export const customSelectOptionClass = "page-marks-custom-option";
//one below the maximum, so that page content which already grabbed the max z-index still covers the overlay
export const customSelectOverlayZIndex = 2147483647 - 1;

//longest attribute value or text that gets rendered into a mark's one-line description
export const maxRenderedValueLength = 2500;

//frames smaller than this (in either dimension) are ignored when merging separately-extracted frame results
export const minFrameDimensionForMerge = 50;
export const maxFramesToMerge = 10;

export const ELEMENT_NODE = 1;
export const TEXT_NODE = 3;

export interface ViewportDetails {
    scrollX: number;
    scrollY: number;
    /**
     * the larger of the root element's client width and the window's inner width
     */
    width: number;
    height: number;
}

/**
 * the subset of DOMRect that the geometry logic reads; DOMRect satisfies it, and so do plain objects in unit tests
 */
export interface ClientRectLike {
    left: number;
    top: number;
    right: number;
    bottom: number;
    width: number;
    height: number;
}

export interface PointOffset {
    x: number;
    y: number;
}

export interface ScrollMetrics {
    scrollWidth: number;
    scrollHeight: number;
    clientWidth: number;
    clientHeight: number;
}

function getInternalClass(obj: unknown): string {return Object.prototype.toString.call(obj).slice(8, -1);}

//all of these guards fall back on the internal class name because elements from a different window (e.g. a
// same-origin iframe, or a separate jsdom instance) fail instanceof checks against this window's constructors

export function isShadowRoot(node: Node | null | undefined): node is ShadowRoot {
    return node !== null && node != undefined && (
        (typeof ShadowRoot !== "undefined" && node instanceof ShadowRoot) || getInternalClass(node) === "ShadowRoot"
        || (getInternalClass(node) === "DocumentFragment" && 'host' in node && 'mode' in node));
}

export function isElement(node: Node | null | undefined): node is Element {
    return node !== null && node !== undefined && node.nodeType === ELEMENT_NODE;
}

const propsAlwaysAndOnlyInHtmlElements = ['style', 'innerText', 'offsetWidth'];
export function isHtmlElement(node: Node | null | undefined): node is HTMLElement {
    if (node === null || node === undefined) { return false; }
    if (typeof HTMLElement !== "undefined" && node instanceof HTMLElement) { return true; }
    const nodeType = getInternalClass(node);
    if ((nodeType.startsWith("SVG") && nodeType.endsWith("Element")) || nodeType.startsWith("MathML")) { return false; }

    return (nodeType.startsWith("HTML") && nodeType.endsWith("Element"))
        || (node.nodeType === ELEMENT_NODE && propsAlwaysAndOnlyInHtmlElements.every(prop => prop in node));
}

export function isIframeElement(element: Element): element is HTMLIFrameElement {
    return element.tagName.toUpperCase() === "IFRAME";
}

export function isSlotElement(element: Element): element is HTMLSlotElement {
    return element.tagName.toUpperCase() === "SLOT" && 'assignedNodes' in element;
}

export function isSelectElement(element: Element): element is HTMLSelectElement {
    return element.tagName.toUpperCase() === "SELECT" && 'options' in element;
}

/**
 * cross-origin frame access is reported through a DOMException whose name is SecurityError
 */
export function isSecurityError(error: unknown): boolean {
    return typeof error === "object" && error !== null && 'name' in error && error.name === "SecurityError";
}

export function renderUnknownValue(val: unknown): string {
    if (val === null) {
        return 'ACTUAL_js_null';
    } else if (val === undefined) {
        return "ACTUAL_js_undefined";
    } else if (typeof val === 'object') {
        if (val instanceof Error) {
            let stackString = val.stack ? val.stack : "no stack available";
            const firstNewlineIndex = stackString.indexOf("\n");
            if (firstNewlineIndex !== -1) {
                stackString = stackString.substring(firstNewlineIndex);
            }//get rid of annoying thing where the error message is repeated at the start of the stack trace string
            return `error type: ${val.name}; message: ${val.message}; stack: ${stackString}`;
        } else if ('name' in val && 'message' in val) {
            //DOMException from another realm doesn't pass the instanceof Error check
            return `error type: ${String(val.name)}; message: ${String(val.message)}`;
        } else {
            return JSON.stringify(val);
        }
    } else {
        return String(val);
    }
}

/**
 * short, log-friendly rendering of an element
 */
export function renderElement(element: Element | null | undefined, maxLength: number = 200): string {
    if (!element) { return renderUnknownValue(element); }
    return element.outerHTML.slice(0, maxLength);
}
