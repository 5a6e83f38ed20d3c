import {Logger} from "loglevel";
import type {DOMWindow} from "jsdom";
import {renderUnknownValue} from "./misc";

export type ListenerMap = Record<string, unknown[]>;

/**
 * best-effort probe for listeners that were registered programmatically (addEventListener), which leave no trace in
 * the element's attributes or properties
 */
export interface ListenerInspector {
    getListeners(element: Element): ListenerMap;
}

export class NoopListenerInspector implements ListenerInspector {
    // eslint-disable-next-line @typescript-eslint/no-unused-vars -- no introspection capability, element is irrelevant
    getListeners(element: Element): ListenerMap {return {};}
}

type GetEventListenersFn = (element: Element) => unknown;

/**
 * chromium exposes getEventListeners() to devtools-protocol evaluation contexts (and the devtools console), but not
 * to ordinary page scripts
 */
function findGetEventListeners(win: Window | DOMWindow): GetEventListenersFn | undefined {
    const candidate: unknown = Reflect.get(win, "getEventListeners");
    if (typeof candidate === "function") {
        return (element: Element) => Reflect.apply(candidate, win, [element]);
    }
    return undefined;
}

function isListenerMap(val: unknown): val is ListenerMap {
    return typeof val === "object" && val !== null && Object.values(val).every(entry => Array.isArray(entry));
}

export class DevtoolsListenerInspector implements ListenerInspector {
    private readonly probe: GetEventListenersFn;
    private readonly logger: Logger;

    constructor(probe: GetEventListenersFn, logger: Logger) {
        this.probe = probe;
        this.logger = logger;
    }

    getListeners(element: Element): ListenerMap {
        try {
            const listeners = this.probe(element);
            return isListenerMap(listeners) ? listeners : {};
        } catch (error: unknown) {
            this.logger.trace(`listener introspection failed for element ${element.tagName}: ${renderUnknownValue(error).slice(0, 200)}`);
            return {};
        }
    }
}

export function createListenerInspector(win: Window | DOMWindow, logger: Logger): ListenerInspector {
    const probe = findGetEventListeners(win);
    if (probe) {
        logger.debug("host exposes getEventListeners, programmatic listeners will count towards interactivity");
        return new DevtoolsListenerInspector(probe, logger);
    }
    return new NoopListenerInspector();
}
