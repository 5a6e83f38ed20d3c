import {Logger} from "loglevel";
import * as fuzz from "fuzzball";
import {DomWrapper} from "./DomWrapper";
import {
    customSelectOptionClass, customSelectOverlayId, customSelectOverlayZIndex, isHtmlElement, isSelectElement,
    renderElement
} from "./misc";

export type OverlayState =
    | { kind: "idle" }
    | { kind: "open", select: HTMLSelectElement };

export type OverlayCloseReason = "optionChosen" | "selectBlurred" | "selectChanged" | "closedByCaller";

//order in which a synthetic selection notifies the page, so that frameworks listening for any of these see the change
export const syntheticSelectionEventSequence = ["focus", "input", "change", "blur"] as const;

const optionValueDataKey = "value";

/**
 * Replaces the native popup of single-choice <select> elements in one document with a DOM-based option list, which
 * shows up in screenshots and can be clicked like any other page content
 * One controller (and one overlay container) per document
 */
export class SelectOverlayController {
    private domHelper: DomWrapper;
    readonly logger: Logger;
    private readonly instrumentedSelects = new WeakSet<HTMLSelectElement>();
    private state: OverlayState = {kind: "idle"};

    /**
     * @param domHelper wrapper around the window of the document whose selects are being taken over
     * @param logger logger to use
     */
    constructor(domHelper: DomWrapper, logger: Logger) {
        this.domHelper = domHelper;
        this.logger = logger;
    }

    get document(): Document {return this.domHelper.dom;}

    getState = (): OverlayState => this.state;

    /**
     * attach the overlay behavior to every single-choice select under the root (piercing shadow roots); selects that
     * were already instrumented are left alone
     * @param root the subtree to search (defaults to the whole document)
     * @return the number of selects that were newly instrumented by this call
     */
    instrument = (root?: Element): number => {
        const scanRoot = root ?? this.domHelper.getDocumentElement();
        this.ensureOverlayContainer();
        let numNewlyInstrumented = 0;
        for (const select of this.findSelects(scanRoot)) {
            if (select.hasAttribute("multiple")) {
                this.logger.trace(`skipping multi-choice select ${renderElement(select, 100)}`);
                continue;
            }
            if (this.instrumentedSelects.has(select)) {continue;}
            select.addEventListener("mousedown", (event: Event) => {
                //only take over when the page hasn't already overridden the default behavior
                if (event.defaultPrevented) {return;}
                event.preventDefault();
                this.open(select);
            });
            select.addEventListener("blur", () => this.closeIfShowing(select, "selectBlurred"));
            select.addEventListener("change", () => this.closeIfShowing(select, "selectChanged"));
            this.instrumentedSelects.add(select);
            numNewlyInstrumented++;
        }
        this.logger.debug(`instrumented ${numNewlyInstrumented} new select elements in document ${this.domHelper.getUrl()}`);
        return numNewlyInstrumented;
    }

    isInstrumented = (select: HTMLSelectElement): boolean => this.instrumentedSelects.has(select);

    /**
     * @return the overlay container of this document, or null if none has been created yet
     */
    getOverlayContainer = (): HTMLElement | null => this.document.getElementById(customSelectOverlayId);

    /**
     * @return the option rows currently in the overlay (empty while idle)
     */
    getOptionRows = (): HTMLElement[] => {
        if (this.state.kind === "idle") {return [];}
        const container = this.getOverlayContainer();
        if (!container) {return [];}
        return Array.from(container.querySelectorAll(`.${customSelectOptionClass}`)).filter(isHtmlElement);
    }

    close = (reason: OverlayCloseReason): void => {
        const container = this.getOverlayContainer();
        if (container) {
            container.style.display = "none";
        }
        if (this.state.kind === "open") {
            this.logger.debug(`closing select overlay, reason: ${reason}`);
        }
        this.state = {kind: "idle"};
    }

    /**
     * pick the row of the open overlay whose label is most similar to the given one, as if it had been clicked
     * @param label the (approximate) text of the desired option
     * @return the text of the chosen option, or undefined if the overlay isn't open or has no rows
     */
    chooseOptionByLabel = (label: string): string | undefined => {
        if (this.state.kind === "idle") {
            this.logger.info(`asked to choose option "${label}" but the select overlay isn't open`);
            return undefined;
        }
        const select = this.state.select;
        let bestRow: HTMLElement | undefined = undefined;
        let bestRowSimilarity = -1;
        for (const row of this.getOptionRows()) {
            const similarity = fuzz.ratio(label, row.textContent ?? "");
            if (similarity > bestRowSimilarity) {
                bestRow = row;
                bestRowSimilarity = similarity;
            }
        }
        if (!bestRow) {return undefined;}
        this.logger.debug(`for requested option label ${label}, chose row "${bestRow.textContent}" with similarity ${bestRowSimilarity}`);
        this.chooseRow(select, bestRow);
        return bestRow.textContent ?? "";
    }

    private closeIfShowing(select: HTMLSelectElement, reason: OverlayCloseReason): void {
        if (this.state.kind === "open" && this.state.select === select) {
            this.close(reason);
        }
    }

    private findSelects(scanRoot: Element): HTMLSelectElement[] {
        const selects: HTMLSelectElement[] = [];
        const searchScope = (scope: Element | ShadowRoot, includeScopeItself: boolean): void => {
            const scopeElements = this.domHelper.fetchElementsByCss("*", scope);
            if (includeScopeItself && "tagName" in scope) {scopeElements.unshift(scope);}
            const shadowRoots: ShadowRoot[] = [];
            for (const elem of scopeElements) {
                if (isSelectElement(elem)) {selects.push(elem);}
                if (elem.shadowRoot) {shadowRoots.push(elem.shadowRoot);}
            }
            //selects in shadow roots (including nested ones) come after all light-DOM selects of the scope
            shadowRoots.forEach(shadowRoot => searchScope(shadowRoot, false));
        };
        searchScope(scanRoot, true);
        return selects;
    }

    private ensureOverlayContainer(): HTMLElement {
        const existingContainer = this.getOverlayContainer();
        if (existingContainer) {return existingContainer;}

        const container = this.document.createElement("div");
        container.id = customSelectOverlayId;
        container.style.position = "absolute";
        container.style.zIndex = String(customSelectOverlayZIndex);
        container.style.display = "none";

        const optionsList = this.document.createElement("div");
        optionsList.setAttribute("role", "listbox");
        optionsList.style.border = "1px solid #ccc";
        optionsList.style.backgroundColor = "#fff";
        optionsList.style.color = "black";
        container.appendChild(optionsList);

        (this.document.body ?? this.domHelper.getDocumentElement()).appendChild(container);
        return container;
    }

    private open(select: HTMLSelectElement): void {
        const container = this.ensureOverlayContainer();
        const optionsList = container.firstElementChild;
        if (!isHtmlElement(optionsList)) {
            this.logger.error(`select overlay container ${renderElement(container)} is missing its options list, unable to show options`);
            return;
        }
        optionsList.innerHTML = "";

        for (const option of Array.from(select.options)) {
            const row = this.document.createElement("div");
            row.className = customSelectOptionClass;
            row.setAttribute("role", "option");
            row.style.padding = "8px";
            row.style.cursor = "pointer";
            row.textContent = option.text;
            row.dataset[optionValueDataKey] = option.value;
            row.addEventListener("mouseenter", () => {row.style.backgroundColor = "#f0f0f0";});
            row.addEventListener("mouseleave", () => {row.style.backgroundColor = "";});
            row.addEventListener("mousedown", (event: Event) => {
                event.stopPropagation();
                this.chooseRow(select, row);
            });
            optionsList.appendChild(row);
        }

        const selectRect = this.domHelper.grabClientBoundingRect(select);
        const {scrollX, scrollY} = this.domHelper.getViewportInfo();
        container.style.top = `${selectRect.bottom + scrollY}px`;
        container.style.left = `${selectRect.left + scrollX}px`;
        container.style.width = `${selectRect.width}px`;
        container.style.display = "block";
        this.state = {kind: "open", select};
        this.logger.debug(`showing select overlay with ${select.options.length} options for select ${renderElement(select, 100)}`);
        select.focus();
    }

    private chooseRow(select: HTMLSelectElement, row: HTMLElement): void {
        select.value = row.dataset[optionValueDataKey] ?? "";
        this.close("optionChosen");
        //events must be created by the select's own window, which differs from this script's for same-origin iframes
        const EventCtor = select.ownerDocument.defaultView?.Event ?? Event;
        for (const eventType of syntheticSelectionEventSequence) {
            select.dispatchEvent(new EventCtor(eventType, {bubbles: true, cancelable: true}));
        }
    }
}
