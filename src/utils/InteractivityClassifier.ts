import {Logger} from "loglevel";
import {DomWrapper} from "./DomWrapper";
import {ListenerInspector} from "./ListenerInspector";

const interactiveTags = new Set([
    'a', 'button', 'details', 'embed', 'input', 'label',
    'menu', 'menuitem', 'object', 'select', 'textarea', 'summary',
    'video', 'audio', 'option', 'iframe'
]);

const interactiveRoles = new Set([
    'button', 'menu', 'menuitem', 'link', 'checkbox', 'radio',
    'slider', 'tab', 'tabpanel', 'textbox', 'combobox', 'grid',
    'listbox', 'option', 'progressbar', 'scrollbar', 'searchbox',
    'switch', 'tree', 'treeitem', 'spinbutton', 'tooltip',
    'a-button-inner', 'a-dropdown-button', 'click',
    'menuitemcheckbox', 'menuitemradio', 'a-button-text',
    'button-text', 'button-icon', 'button-icon-only',
    'button-text-icon-only', 'dropdown'
]);

const clickHandlerAttributes = ['onclick', 'ng-click', '@click', 'v-on:click'];

const pointerListenerTypes = ['click', 'mousedown', 'mouseup', 'touchstart', 'touchend'];

const stateAriaAttributes = ['aria-expanded', 'aria-pressed', 'aria-selected', 'aria-checked'];

/**
 * decides whether an element is something an agent could act on (or scroll)
 */
export class InteractivityClassifier {
    private domHelper: DomWrapper;
    private listenerInspector: ListenerInspector;
    readonly logger: Logger;

    constructor(domHelper: DomWrapper, listenerInspector: ListenerInspector, logger: Logger) {
        this.domHelper = domHelper;
        this.listenerInspector = listenerInspector;
        this.logger = logger;
    }

    /**
     * @param element the element to classify
     * @param isScanRootGiven whether the scan was narrowed to a caller-chosen subtree (rather than the whole page)
     * @return true if the element has an interactive tag, interactive attributes, a click-like handler, or is scrollable
     */
    isInteractive = (element: Element, isScanRootGiven: boolean): boolean => {
        return this.hasInteractiveTag(element) || this.hasInteractiveAttributes(element)
            || this.hasInteractiveEventListeners(element) || this.isScrollable(element, isScanRootGiven);
    }

    hasInteractiveTag = (element: Element): boolean => {
        return interactiveTags.has(element.tagName.toLowerCase());
    }

    hasInteractiveAttributes = (element: Element): boolean => {
        const role = element.getAttribute('role');
        const ariaRole = element.getAttribute('aria-role');
        const tabIndex = element.getAttribute('tabindex');
        const onAttribute = element.getAttribute('on');

        if (element.getAttribute('contenteditable') === 'true') {return true;}
        if ((role && interactiveRoles.has(role)) || (ariaRole && interactiveRoles.has(ariaRole))) {return true;}
        if (tabIndex !== null && tabIndex !== '-1') {return true;}
        //AMP binds taps through on="tap:..."
        if (onAttribute && onAttribute.startsWith('tap:')) {return true;}

        return stateAriaAttributes.some(attr => element.hasAttribute(attr));
    }

    hasInteractiveEventListeners = (element: Element): boolean => {
        const hasInlineClickProperty = 'onclick' in element && element.onclick !== null && element.onclick !== undefined;
        if (hasInlineClickProperty || clickHandlerAttributes.some(attr => element.hasAttribute(attr))) {return true;}

        const listeners = this.listenerInspector.getListeners(element);
        return pointerListenerTypes.some(listenerType => (listeners[listenerType]?.length ?? 0) > 0);
    }

    /**
     * Scrollability test: content overflow in at least one axis combined with a computed overflow of scroll/auto on
     * that axis
     * @param element the element which might be scrollable
     * @param isScanRootGiven whether the scan was narrowed to a subtree; if not, the page's root element is never
     *                          reported, because the caller can always scroll the full page
     */
    isScrollable = (element: Element, isScanRootGiven: boolean): boolean => {
        if (!isScanRootGiven && element === this.domHelper.getDocumentElement()) {
            return false;
        }
        const style = this.domHelper.getComputedStyle(element);
        const {scrollWidth, scrollHeight, clientWidth, clientHeight} = this.domHelper.getScrollMetrics(element);

        const hasScrollableYContent = scrollHeight > clientHeight;
        const overflowYScroll = style.overflowY === 'scroll' || style.overflowY === 'auto';

        const hasScrollableXContent = scrollWidth > clientWidth;
        const overflowXScroll = style.overflowX === 'scroll' || style.overflowX === 'auto';

        return (hasScrollableYContent && overflowYScroll) || (hasScrollableXContent && overflowXScroll);
    }
}
