/**
 * @fileoverview This file contains utility functions for turning extraction results into the text and box
 * annotations that are shown to the model, and for combining results from separately-scanned frames
 */
import {createNamedLogger} from "./shared_logging_setup";
import {ElementDescription, MarkCentroid, PoiExtractionResult} from "./mark_defs";
import {maxFramesToMerge, maxRenderedValueLength, minFrameDimensionForMerge} from "./misc";

const logger = createNamedLogger("format-mark-utils");

//void elements, which never have content of their own
export const selfContainedTags: ReadonlySet<string> = new Set([
    "area", "base", "br", "col", "embed", "hr", "img", "input", "link", "meta", "param", "source", "track", "wbr"
]);

export const lineBreakReplacement = "⏎";

export interface MarkBoundingBox {
    label: string;
    left: number;
    top: number;
    right: number;
    bottom: number;
}

/**
 * position and size of an iframe (relative to the top-level viewport) whose contents were scanned separately
 */
export interface FrameRect {
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface FramePoiResult {
    frameRect: FrameRect;
    result: PoiExtractionResult;
}

const truncateRenderedValue = (val: string): string =>
    val.length > maxRenderedValueLength ? val.slice(0, maxRenderedValueLength - 1) + "…" : val;

const replaceLineBreaks = (val: string): string => val.replace(/\r\n|\r|\n/g, lineBreakReplacement);

/**
 * @description render one mark as a single pseudo-html line, e.g. `- [3] <button aria_label="Close">X</button>`
 * Attributes appear in the description's own key order; null ones are left out, true booleans are rendered as a bare
 * key and false ones are left out
 * @param markId the index of the mark
 * @param description the mark's attribute bag
 * @return the line of text for the mark
 */
export const elementAsText = (markId: number, description: ElementDescription): string => {
    const {tag, text, ...rawAttributes} = description;
    const attributeStrs: string[] = [];
    for (const [key, val] of Object.entries(rawAttributes)) {
        if (val === null || val === undefined) {continue;}
        if (typeof val === "boolean") {
            if (val) {attributeStrs.push(key);}
        } else {
            attributeStrs.push(`${key}="${truncateRenderedValue(String(val))}"`);
        }
    }
    const attributesStr = replaceLineBreaks(attributeStrs.length > 0 ? " " + attributeStrs.join(" ") : "");
    const tagName = tag.toLowerCase();
    const renderedText = replaceLineBreaks(truncateRenderedValue(text ?? ""));

    if (selfContainedTags.has(tagName)) {
        if (renderedText) {
            logger.warn(`Got self-contained element '${tagName}' which contained text '${renderedText}'.`);
        } else {
            return `- [${markId}] <${tagName}${attributesStr}/>`;
        }
    }
    return `- [${markId}] <${tagName}${attributesStr}>${renderedText}</${tagName}>`;
}

/**
 * @return one line per mark (see elementAsText), in index order
 */
export const formatPoiText = (descriptions: ElementDescription[]): string => {
    return descriptions.map((description, markId) => elementAsText(markId, description))
        .filter(line => line.length > 0).join("\n");
}

/**
 * @description integer box for drawing a mark's label onto a screenshot; the box is expanded outward to whole pixels
 */
export const toBoundingBox = (centroid: MarkCentroid, label: string): MarkBoundingBox => {
    return {
        label,
        left: Math.floor(centroid.left),
        top: Math.floor(centroid.top),
        right: Math.ceil(centroid.right),
        bottom: Math.ceil(centroid.bottom)
    };
}

/**
 * @description append results that were extracted separately inside iframes (whose coordinates are therefore
 * relative to the iframe) to the main page's result, translating them into the main page's coordinate space
 * Only the first few frames are considered, and frames too small to hold anything usable are skipped
 * @param mainResult the top-level page's result
 * @param frameResults per-frame results, in document order of the iframes
 * @return a new result; the indices of the frames' marks follow on from the main page's marks
 */
export const mergeFramePoiResults = (mainResult: PoiExtractionResult, frameResults: FramePoiResult[]
): PoiExtractionResult => {
    const mergedDescriptions = [...mainResult.element_descriptions];
    const mergedCentroids = [...mainResult.element_centroids];

    if (frameResults.length > maxFramesToMerge) {
        logger.info(`only merging the first ${maxFramesToMerge} of ${frameResults.length} frame results`);
    }
    for (const {frameRect, result} of frameResults.slice(0, maxFramesToMerge)) {
        if (frameRect.width < minFrameDimensionForMerge || frameRect.height < minFrameDimensionForMerge) {
            logger.debug(`skipping frame result for ${frameRect.width}x${frameRect.height} frame at (${frameRect.x}, ${frameRect.y})`);
            continue;
        }
        const offsetX = Math.round(frameRect.x);
        const offsetY = Math.round(frameRect.y);
        mergedDescriptions.push(...result.element_descriptions);
        mergedCentroids.push(...result.element_centroids.map(centroid => ({
            x: centroid.x + offsetX, y: centroid.y + offsetY,
            left: centroid.left + offsetX, top: centroid.top + offsetY,
            right: centroid.right + offsetX, bottom: centroid.bottom + offsetY
        })));
    }
    return {pass_id: mainResult.pass_id, element_descriptions: mergedDescriptions, element_centroids: mergedCentroids};
}

/**
 * @description check whether the marks have moved between two extraction passes, e.g. to decide whether the page
 * had settled before a screenshot was taken
 */
export const havePoiPositionsChanged = (before: PoiExtractionResult, after: PoiExtractionResult): boolean => {
    if (before.element_centroids.length !== after.element_centroids.length) {return true;}
    return before.element_centroids.some((centroid, idx) => {
        const otherCentroid = after.element_centroids[idx];
        return centroid.x !== otherCentroid.x || centroid.y !== otherCentroid.y;
    });
}
