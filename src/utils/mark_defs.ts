import {PointOffset} from "./misc";

/**
 * a rectangle in the coordinate space of the top-level viewport, after iframe-offset translation and viewport clipping
 * 0 <= left <= right <= viewport width, likewise for top/bottom
 */
export interface MarkRect {
    left: number;
    top: number;
    right: number;
    bottom: number;
    width: number;
    height: number;
}

/**
 * the scope within which an element's coordinates and hit-tests are resolved
 * iframeOffset is the accumulated position of the enclosing iframe(s) relative to the top-level viewport
 */
export type TraversalContext =
    | { kind: "document", root: Document, iframeOffset: PointOffset }
    | { kind: "shadowRoot", root: ShadowRoot, iframeOffset: PointOffset }
    | { kind: "iframeDocument", root: Document, iframeOffset: PointOffset };

export interface Candidate {
    element: Element;
    context: TraversalContext;
    rects: MarkRect[];
    area: number;
    isScrollable: boolean;
}

/**
 * structured attribute bag for one mark; the snake_case keys are the wire format read by the browser-driving process
 * every nullable field is null when the underlying attribute is absent
 */
export interface ElementDescription {
    tag: string;
    text: string;
    value: string | null;
    placeholder: string | null;
    element_type: string | null;
    aria_label: string | null;
    name: string | null;
    required: string | null;
    disabled: string | null;
    pattern: string | null;
    checked: string | null;
    minlength: string | null;
    maxlength: string | null;
    role: string | null;
    title: string | null;
    scrollable: boolean;
}

export interface MarkCentroid {
    x: number;
    y: number;
    left: number;
    top: number;
    right: number;
    bottom: number;
}

export interface Mark {
    /**
     * position in emission order within one extraction pass; not stable across passes
     */
    index: number;
    centroid: PointOffset;
    rect: MarkRect;
    description: ElementDescription;
}

export interface PoiExtractionResult {
    pass_id: string;
    element_descriptions: ElementDescription[];
    element_centroids: MarkCentroid[];
}

export function toMarkCentroid(mark: Mark): MarkCentroid {
    return {
        x: mark.centroid.x, y: mark.centroid.y,
        left: mark.rect.left, top: mark.rect.top, right: mark.rect.right, bottom: mark.rect.bottom
    };
}

export function toPoiExtractionResult(passId: string, marks: Mark[]): PoiExtractionResult {
    return {
        pass_id: passId,
        element_descriptions: marks.map(mark => mark.description),
        element_centroids: marks.map(toMarkCentroid)
    };
}
