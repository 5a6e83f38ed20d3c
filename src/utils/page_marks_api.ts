import type {DOMWindow} from "jsdom";
import {DomWrapper} from "./DomWrapper";
import {PageMarker, PageMarkerOptions} from "./PageMarker";
import {PoiExtractionResult} from "./mark_defs";
import {setLogLevelForAllLoggers} from "./shared_logging_setup";

/**
 * the functions that the browser-driving process calls (through script evaluation) after injecting the bundle
 */
export interface PageMarksApi {
    findPois: (root?: Element) => PoiExtractionResult;
    overwriteDefaultSelects: (root?: Element) => number;
    resolveMark: (index: number, passId?: string) => Element | null;
    setLogLevel: (levelName: unknown) => void;
}

declare global {
    interface Window {
        pageMarks?: PageMarksApi;
    }
}

/**
 * expose the page-marks functions on the window as window.pageMarks
 * Installing into a window that already has them is a no-op (the existing api, and the index registry behind it,
 * are kept)
 * @param win the window whose page should be marked
 * @param options overrides for the page marker's collaborators (the dom wrapper defaults to one around win)
 * @return the api installed on the window
 */
export function installPageMarksApi(win: Window | DOMWindow, options: PageMarkerOptions = {}): PageMarksApi {
    const existingApi = win.pageMarks;
    if (existingApi) {return existingApi;}

    const pageMarker = new PageMarker({...options, domHelper: options.domHelper ?? new DomWrapper(win)});
    const api: PageMarksApi = {
        findPois: pageMarker.findPois,
        overwriteDefaultSelects: pageMarker.overwriteDefaultSelects,
        resolveMark: pageMarker.resolveMark,
        setLogLevel: setLogLevelForAllLoggers
    };
    win.pageMarks = api;
    pageMarker.logger.debug(`installed page marks api for page ${pageMarker.domHelper.getUrl()}`);
    return api;
}
