export {PageMarker} from "./utils/PageMarker";
export type {PageMarkerOptions} from "./utils/PageMarker";
export {installPageMarksApi} from "./utils/page_marks_api";
export type {PageMarksApi} from "./utils/page_marks_api";
export {DomWrapper} from "./utils/DomWrapper";
export {
    createListenerInspector, DevtoolsListenerInspector, NoopListenerInspector
} from "./utils/ListenerInspector";
export type {ListenerInspector, ListenerMap} from "./utils/ListenerInspector";
export {InteractivityClassifier} from "./utils/InteractivityClassifier";
export {calculateArea, GeometryResolver} from "./utils/GeometryResolver";
export {VisibilityFilter} from "./utils/VisibilityFilter";
export {TextFlattener} from "./utils/TextFlattener";
export {TreeWalker} from "./utils/TreeWalker";
export {getElementValue, MarkAssembler} from "./utils/MarkAssembler";
export {MarkRegistry} from "./utils/MarkRegistry";
export {SelectOverlayController, syntheticSelectionEventSequence} from "./utils/SelectOverlayController";
export type {OverlayCloseReason, OverlayState} from "./utils/SelectOverlayController";
export {
    elementAsText, formatPoiText, havePoiPositionsChanged, mergeFramePoiResults, selfContainedTags, toBoundingBox
} from "./utils/format_mark_utils";
export type {FramePoiResult, FrameRect, MarkBoundingBox} from "./utils/format_mark_utils";
export {toMarkCentroid, toPoiExtractionResult} from "./utils/mark_defs";
export type {
    Candidate, ElementDescription, Mark, MarkCentroid, MarkRect, PoiExtractionResult, TraversalContext
} from "./utils/mark_defs";
export {
    createNamedLogger, getChosenLogLevel, setLogLevelForAllLoggers, setLogSink
} from "./utils/shared_logging_setup";
export type {LogMessage, LogSink} from "./utils/shared_logging_setup";
