import {JSDOM} from "jsdom";
import {DomWrapper} from "../../src/utils/DomWrapper";
import {getElementValue, MarkAssembler} from "../../src/utils/MarkAssembler";
import {MarkRegistry} from "../../src/utils/MarkRegistry";
import {TextFlattener} from "../../src/utils/TextFlattener";
import {Candidate, MarkRect, toPoiExtractionResult, TraversalContext} from "../../src/utils/mark_defs";
import {calculateArea} from "../../src/utils/GeometryResolver";
import {createTestLogger, FakeLayout} from "../test_utils";

const testLogger = createTestLogger("mark-assembler-test");

function rect(left: number, top: number, right: number, bottom: number): MarkRect {
    return {left, top, right, bottom, width: right - left, height: bottom - top};
}

describe('MarkAssembler.assemble', () => {
    const {window} = new JSDOM(`<!DOCTYPE html><body>
<a id="wrapped" href="#">Read the full article</a>
<div id="card" role="button">Plan<a id="card-link" href="#">Compare plans</a></div>
<input id="email" type="email" name="email" placeholder="you@example.com" aria-label="Email" value="a@b.c" maxlength="40" required>
<div id="feed" title="News feed">Latest</div>
</body>`);
    const domWrapper = new DomWrapper(window);
    const assembler = new MarkAssembler(new TextFlattener(domWrapper, testLogger), testLogger);
    const {document} = window;
    const context: TraversalContext = {kind: "document", root: document, iframeOffset: {x: 0, y: 0}};
    let registry: MarkRegistry;

    const byId = (id: string): HTMLElement => {
        const elem = document.getElementById(id);
        if (!elem) {throw new Error(`no element with id ${id}`);}
        return elem;
    };
    const candidate = (id: string, rects: MarkRect[], isScrollable: boolean = false): Candidate =>
        ({element: byId(id), context, rects, area: calculateArea(rects), isScrollable});

    beforeEach(() => {
        new FakeLayout(domWrapper);
        registry = new MarkRegistry();
        registry.startPass();
    });

    it('emits one mark per rect with contiguous indices and rounded centroids', () => {
        const marks = assembler.assemble([
            candidate('wrapped', [rect(10, 10, 111, 31), rect(0, 31, 50, 52)]),
            candidate('feed', [rect(200, 300, 400, 500)], true)
        ], registry);

        expect(marks.map(mark => mark.index)).toEqual([0, 1, 2]);
        expect(marks.map(mark => mark.centroid)).toEqual([{x: 61, y: 21}, {x: 25, y: 42}, {x: 300, y: 400}]);
        expect(marks[0].description).toBe(marks[1].description);
        expect(marks[0].description.text).toBe("Read the full article");
        expect(marks[2].description.scrollable).toBe(true);
        expect(marks[2].description.title).toBe("News feed");
        expect(registry.resolve(1)).toBe(byId('wrapped'));
        expect(registry.resolve(2)).toBe(byId('feed'));
        expect(registry.size).toBe(3);
    });

    it('gives no mark to a candidate without rects but still excludes its text from its ancestors', () => {
        const marks = assembler.assemble([
            candidate('card', [rect(0, 0, 300, 100)]),
            candidate('card-link', [])
        ], registry);

        expect(marks).toHaveLength(1);
        expect(marks[0].description.text).toBe("Plan");
        expect(registry.size).toBe(1);
    });

    it('describes form controls with their attributes and live value', () => {
        const emailInput = document.querySelector('input');
        if (!emailInput) {throw new Error("email input missing");}
        emailInput.value = "typed@example.com";
        const [mark] = assembler.assemble([candidate('email', [rect(0, 0, 200, 30)])], registry);

        expect(mark.description).toEqual({
            tag: "INPUT",
            text: "",
            value: "typed@example.com",
            placeholder: "you@example.com",
            element_type: "email",
            aria_label: "Email",
            name: "email",
            required: "",
            disabled: null,
            pattern: null,
            checked: null,
            minlength: null,
            maxlength: "40",
            role: null,
            title: null,
            scrollable: false
        });
    });

    it('converts marks to the wire format with aligned sequences', () => {
        const marks = assembler.assemble([candidate('feed', [rect(200, 300, 400, 500)])], registry);
        const result = toPoiExtractionResult("pass-1", marks);
        expect(result.pass_id).toBe("pass-1");
        expect(result.element_descriptions).toEqual([marks[0].description]);
        expect(result.element_centroids).toEqual([{x: 300, y: 400, left: 200, top: 300, right: 400, bottom: 500}]);
    });
});

describe('getElementValue', () => {
    const {window} = new JSDOM(`<!DOCTYPE html><body></body>`);
    const {document} = window;

    it('returns the value property of form controls', () => {
        const textarea = document.createElement('textarea');
        textarea.value = "notes";
        expect(getElementValue(textarea)).toBe("notes");
    });

    it('returns null for elements without a value property', () => {
        expect(getElementValue(document.createElement('a'))).toBeNull();
        expect(getElementValue(document.createElement('div'))).toBeNull();
    });
});

describe('MarkRegistry', () => {
    const {window} = new JSDOM(`<!DOCTYPE html><body><button>A</button><button>B</button></body>`);
    const [firstButton, secondButton] = Array.from(window.document.querySelectorAll('button'));

    it('hands out contiguous indices from 0 within a pass', () => {
        const registry = new MarkRegistry();
        registry.startPass();
        expect(registry.register(firstButton)).toBe(0);
        expect(registry.register(secondButton)).toBe(1);
        expect(registry.resolve(0)).toBe(firstButton);
        expect(registry.resolve(1)).toBe(secondButton);
    });

    it('uses a fresh uuid for each pass and forgets earlier passes', () => {
        const registry = new MarkRegistry();
        expect(registry.passId).toBeUndefined();
        const firstPassId = registry.startPass();
        registry.register(firstButton);
        const secondPassId = registry.startPass();

        expect(firstPassId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
        expect(secondPassId).not.toBe(firstPassId);
        expect(registry.passId).toBe(secondPassId);
        expect(registry.size).toBe(0);
        expect(registry.resolve(0)).toBeNull();
    });

    it('rejects indices from a stale pass and out-of-range indices', () => {
        const registry = new MarkRegistry();
        const stalePassId = registry.startPass();
        const currentPassId = registry.startPass();
        registry.register(firstButton);

        expect(registry.resolve(0, stalePassId)).toBeNull();
        expect(registry.resolve(0, currentPassId)).toBe(firstButton);
        expect(registry.resolve(1)).toBeNull();
        expect(registry.resolve(-1)).toBeNull();
        expect(registry.resolve(0.5)).toBeNull();
    });
});
