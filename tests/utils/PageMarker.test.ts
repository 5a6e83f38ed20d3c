import {DOMWindow, JSDOM} from "jsdom";
import {DomWrapper} from "../../src/utils/DomWrapper";
import {PageMarker} from "../../src/utils/PageMarker";
import {NoopListenerInspector} from "../../src/utils/ListenerInspector";
import {customSelectOverlayId} from "../../src/utils/misc";
import {createTestLogger, FakeLayout} from "../test_utils";

const testLogger = createTestLogger("page-marker-test");

describe('PageMarker', () => {
    let testWindow: DOMWindow;
    let document: Document;
    let domWrapper: DomWrapper;
    let layout: FakeLayout;
    let pageMarker: PageMarker;

    const setUpPage = (bodyHtml: string): void => {
        testWindow = new JSDOM(`<!DOCTYPE html><body>${bodyHtml}</body>`).window;
        document = testWindow.document;
        domWrapper = new DomWrapper(testWindow);
        layout = new FakeLayout(domWrapper);
        layout.place(document.body, {left: 0, top: 0, width: 1000, height: 800});
        pageMarker = new PageMarker({domHelper: domWrapper, logger: testLogger, listenerInspector: new NoopListenerInspector()});
    };

    const byId = (id: string): HTMLElement => {
        const elem = document.getElementById(id);
        if (!elem) {throw new Error(`no element with id ${id}`);}
        return elem;
    };

    const pressPointer = (target: Element): boolean =>
        target.dispatchEvent(new testWindow.MouseEvent("mousedown", {bubbles: true, cancelable: true}));

    describe('end-to-end', () => {
        beforeEach(() => {
            setUpPage(`<button id="submit">Submit</button>
<a id="hidden-link" href="/hidden" style="display:none">Hidden</a>
<select id="choice"><option value="A">A</option><option value="B">B</option></select>`);
            layout.place(byId('submit'), {left: 100, top: 100, width: 120, height: 40});
            layout.place(byId('hidden-link'), {left: 100, top: 200, width: 100, height: 20});
            layout.place(byId('choice'), {left: 100, top: 900, width: 200, height: 30});
        });

        it('marks only the visible button', () => {
            const result = pageMarker.findPois();

            expect(result.element_descriptions).toHaveLength(1);
            expect(result.element_descriptions[0].tag).toBe("BUTTON");
            expect(result.element_descriptions[0].text).toBe("Submit");
            expect(result.element_centroids).toEqual([{x: 160, y: 120, left: 100, top: 100, right: 220, bottom: 140}]);
            expect(result.pass_id).toBe(pageMarker.passId);
            expect(pageMarker.resolveMark(0, result.pass_id)).toBe(byId('submit'));
        });

        it('shows a synthetic overlay with one row per option when the select is pressed', () => {
            expect(pageMarker.overwriteDefaultSelects()).toBe(1);
            pressPointer(byId('choice'));

            const overlay = document.getElementById(customSelectOverlayId);
            expect(overlay?.style.display).toBe("block");
            expect(overlay?.style.top).toBe("930px");
            expect(overlay?.querySelectorAll('[role="option"]')).toHaveLength(2);
            expect(pageMarker.getSelectOverlayController(document).getState().kind).toBe("open");
        });

        it('produces identical marks when extraction is repeated on an unchanged page', () => {
            const firstResult = pageMarker.findPois();
            const secondResult = pageMarker.findPois();

            expect(secondResult.element_descriptions).toEqual(firstResult.element_descriptions);
            expect(secondResult.element_centroids).toEqual(firstResult.element_centroids);
            expect(secondResult.pass_id).not.toBe(firstResult.pass_id);
        });

        it('rejects mark indices from an earlier pass', () => {
            const firstResult = pageMarker.findPois();
            const secondResult = pageMarker.findPois();

            expect(pageMarker.resolveMark(0, firstResult.pass_id)).toBeNull();
            expect(pageMarker.resolveMark(0, secondResult.pass_id)).toBe(byId('submit'));
            expect(pageMarker.resolveMark(1)).toBeNull();
        });
    });

    it('numbers marks contiguously and keeps every rect inside the viewport', () => {
        setUpPage(`<a id="edge-link" href="#">Edge</a><button id="wide">Wide</button><a id="wrapped" href="#">Wrapped link</a>`);
        layout.place(byId('edge-link'), {left: -40, top: 10, width: 100, height: 20});
        layout.place(byId('wide'), {left: 800, top: 720, width: 300, height: 100});
        layout.place(byId('wrapped'), {
            left: 0, top: 100, width: 500, height: 40,
            clientRects: [{left: 300, top: 100, right: 500, bottom: 120, width: 200, height: 20},
                {left: 0, top: 120, right: 120, bottom: 140, width: 120, height: 20}]
        });

        const marks = pageMarker.findMarks();

        expect(marks.map(mark => mark.index)).toEqual([0, 1, 2, 3]);
        for (const {rect} of marks) {
            expect(0 <= rect.left && rect.left <= rect.right && rect.right <= 1000).toBe(true);
            expect(0 <= rect.top && rect.top <= rect.bottom && rect.bottom <= 800).toBe(true);
        }
        expect(marks[0].rect).toEqual({left: 0, top: 10, right: 60, bottom: 30, width: 60, height: 20});
        expect(marks[1].rect).toEqual({left: 800, top: 720, right: 1000, bottom: 800, width: 200, height: 80});
        expect(pageMarker.resolveMark(2)).toBe(byId('wrapped'));
        expect(pageMarker.resolveMark(3)).toBe(byId('wrapped'));
    });

    it('keeps the text of a nested interactive child out of its container label', () => {
        setUpPage(`<div id="order-row" role="link">Order 1042<button id="delete">Delete</button></div>`);
        layout.place(byId('order-row'), {left: 0, top: 0, width: 400, height: 40});
        layout.place(byId('delete'), {left: 300, top: 5, width: 80, height: 30});

        const result = pageMarker.findPois();

        expect(result.element_descriptions.map(description => description.text)).toEqual(["Order 1042", "Delete"]);
    });

    it('leaves out an element hidden under an unrelated overlay', () => {
        setUpPage(`<button id="buy">Buy</button><div id="cookie-banner"><button id="accept">Accept</button></div>`);
        layout.place(byId('buy'), {left: 100, top: 700, width: 100, height: 40});
        layout.place(byId('cookie-banner'), {left: 0, top: 650, width: 1000, height: 150});
        layout.place(byId('accept'), {left: 800, top: 700, width: 100, height: 40});

        const result = pageMarker.findPois();

        expect(result.element_descriptions.map(description => description.text)).toEqual(["Accept"]);
    });

    it('marks elements in shadow roots and same-origin iframes, skipping cross-origin iframes', () => {
        setUpPage(`<div id="host"></div><iframe id="same-origin"></iframe><iframe id="cross-origin"></iframe>`);
        const shadowRoot = byId('host').attachShadow({mode: "open"});
        shadowRoot.innerHTML = `<button id="shadow-btn">Shadow</button>`;
        const shadowButton = shadowRoot.getElementById('shadow-btn');
        const frameDoc = new JSDOM(`<!DOCTYPE html><body><button id="framed">Framed</button></body>`).window.document;
        Object.defineProperty(byId('same-origin'), 'contentDocument', {get: () => frameDoc, configurable: true});
        Object.defineProperty(byId('cross-origin'), 'contentDocument', {
            get: () => {throw new DOMException("Blocked a frame from accessing a cross-origin frame", "SecurityError");},
            configurable: true
        });

        layout.place(byId('host'), {left: 0, top: 0, width: 200, height: 50});
        layout.place(shadowButton, {left: 10, top: 10, width: 100, height: 30});
        layout.place(byId('same-origin'), {left: 300, top: 200, width: 400, height: 300});
        layout.place(frameDoc.getElementById('framed'), {left: 10, top: 20, width: 50, height: 30});

        const result = pageMarker.findPois();

        expect(result.element_descriptions.map(description => description.tag)).toEqual(["BUTTON", "IFRAME", "BUTTON"]);
        expect(result.element_descriptions[2].text).toBe("Framed");
        expect(result.element_centroids[2]).toEqual({x: 335, y: 235, left: 310, top: 220, right: 360, bottom: 250});
        expect(pageMarker.resolveMark(0)).toBe(shadowButton);
    });

    it('gives no marks to the contents of a same-origin iframe below the fold', () => {
        setUpPage(`<button id="top-btn">Top</button><iframe id="low-frame"></iframe>`);
        const frameDoc = new JSDOM(`<!DOCTYPE html><body><button id="framed">Framed</button></body>`).window.document;
        Object.defineProperty(byId('low-frame'), 'contentDocument', {get: () => frameDoc, configurable: true});
        layout.place(byId('top-btn'), {left: 10, top: 10, width: 80, height: 20});
        layout.place(byId('low-frame'), {left: 300, top: 900, width: 400, height: 300});
        layout.place(frameDoc.getElementById('framed'), {left: 10, top: 20, width: 50, height: 30});

        const marks = pageMarker.findMarks();

        expect(marks.map(mark => mark.rect)).toEqual([{left: 10, top: 10, right: 90, bottom: 30, width: 80, height: 20}]);
        expect(pageMarker.resolveMark(0)).toBe(byId('top-btn'));
    });

    it('returns an empty result instead of throwing when extraction fails', () => {
        setUpPage(`<button id="submit">Submit</button>`);
        layout.place(byId('submit'), {left: 100, top: 100, width: 120, height: 40});
        pageMarker.findPois();
        domWrapper.getDocumentElement = jest.fn().mockImplementation(() => {
            throw new Error("document is being torn down");
        });

        const result = pageMarker.findPois();

        expect(result.element_descriptions).toEqual([]);
        expect(result.element_centroids).toEqual([]);
        expect(result.pass_id).toBe(pageMarker.passId);
        expect(pageMarker.resolveMark(0)).toBeNull();
    });

    it('instruments selects in same-origin iframe documents with their own overlay', () => {
        setUpPage(`<select id="top-select"><option>One</option></select><iframe id="frame"></iframe>`);
        const frameWindow = new JSDOM(`<!DOCTYPE html><body><select id="framed-select"><option value="x">X</option><option value="y">Y</option></select></body>`).window;
        const frameDoc = frameWindow.document;
        Object.defineProperty(byId('frame'), 'contentDocument', {get: () => frameDoc, configurable: true});

        expect(pageMarker.overwriteDefaultSelects()).toBe(2);
        expect(pageMarker.overwriteDefaultSelects()).toBe(0);

        const frameController = pageMarker.getSelectOverlayController(frameDoc);
        expect(frameController).not.toBe(pageMarker.getSelectOverlayController(document));
        expect(frameController).toBe(pageMarker.getSelectOverlayController(frameDoc));

        const framedSelect = frameDoc.getElementById('framed-select');
        if (!framedSelect) {throw new Error("framed select missing");}
        framedSelect.dispatchEvent(new frameWindow.MouseEvent("mousedown", {bubbles: true, cancelable: true}));
        expect(frameDoc.getElementById(customSelectOverlayId)?.querySelectorAll('[role="option"]')).toHaveLength(2);
        expect(frameController.chooseOptionByLabel("Y")).toBe("Y");
        expect(frameController.getState()).toEqual({kind: "idle"});
    });
});
