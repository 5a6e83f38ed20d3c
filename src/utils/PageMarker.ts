import {Logger} from "loglevel";
import {DomWrapper} from "./DomWrapper";
import {createNamedLogger} from "./shared_logging_setup";
import {createListenerInspector, ListenerInspector} from "./ListenerInspector";
import {InteractivityClassifier} from "./InteractivityClassifier";
import {VisibilityFilter} from "./VisibilityFilter";
import {GeometryResolver} from "./GeometryResolver";
import {TextFlattener} from "./TextFlattener";
import {TreeWalker} from "./TreeWalker";
import {MarkAssembler} from "./MarkAssembler";
import {MarkRegistry} from "./MarkRegistry";
import {SelectOverlayController} from "./SelectOverlayController";
import {Mark, PoiExtractionResult, toPoiExtractionResult} from "./mark_defs";
import {isIframeElement, renderUnknownValue} from "./misc";

export interface PageMarkerOptions {
    /**
     * wrapper around the top-level window of the page (defaults to one around the global window)
     */
    domHelper?: DomWrapper;
    listenerInspector?: ListenerInspector;
    /**
     * if given, used by every component instead of their own named loggers
     */
    logger?: Logger;
}

/**
 * per-window entry point for both extraction and select takeover
 * Holds the mark registry of the latest extraction pass and the select overlay controller of each document
 */
export class PageMarker {
    readonly domHelper: DomWrapper;
    readonly logger: Logger;
    private readonly registry = new MarkRegistry();
    private readonly walker: TreeWalker;
    private readonly assembler: MarkAssembler;
    private readonly overlayControllers = new WeakMap<Document, SelectOverlayController>();
    private readonly overlayLogger: Logger;

    constructor(options: PageMarkerOptions = {}) {
        this.domHelper = options.domHelper ?? new DomWrapper(window);
        this.logger = options.logger ?? createNamedLogger('page-marker');
        const loggerFor = (loggerName: string): Logger => options.logger ?? createNamedLogger(loggerName);

        const listenerInspector = options.listenerInspector
            ?? createListenerInspector(this.domHelper.window, loggerFor('listener-inspector'));
        const classifier = new InteractivityClassifier(this.domHelper, listenerInspector, loggerFor('interactivity-classifier'));
        const visibilityFilter = new VisibilityFilter(this.domHelper, loggerFor('visibility-filter'));
        const geometryResolver = new GeometryResolver(this.domHelper, loggerFor('geometry-resolver'));
        this.walker = new TreeWalker(this.domHelper, classifier, visibilityFilter, geometryResolver, loggerFor('tree-walker'));
        this.assembler = new MarkAssembler(new TextFlattener(this.domHelper, loggerFor('text-flattener')), loggerFor('mark-assembler'));
        this.overlayLogger = loggerFor('select-overlay');
    }

    /**
     * id of the latest extraction pass (undefined before the first one)
     */
    get passId(): string | undefined {return this.registry.passId;}

    /**
     * run a full extraction pass, replacing the previous pass's index registry
     * @param root optional subtree to restrict the scan to
     */
    findMarks = (root?: Element): Mark[] => {
        const passId = this.registry.startPass();
        const candidates = this.walker.walk(root);
        const marks = this.assembler.assemble(candidates, this.registry);
        const totalCandidateArea = candidates.reduce((acc, candidate) => acc + candidate.area, 0);
        this.logger.debug(`candidates of pass ${passId} cover ${totalCandidateArea} square pixels of the viewport`);
        this.logger.info(`extraction pass ${passId} produced ${marks.length} marks from ${candidates.length} candidates`);
        return marks;
    }

    /**
     * same as findMarks, but in the wire format and without ever throwing; an unexpected failure yields an empty
     * result (with an empty registry) rather than an exception
     */
    findPois = (root?: Element): PoiExtractionResult => {
        try {
            const marks = this.findMarks(root);
            return toPoiExtractionResult(this.registry.passId ?? "", marks);
        } catch (error: unknown) {
            this.logger.error(`extraction pass failed, returning empty result: ${renderUnknownValue(error)}`);
            return toPoiExtractionResult(this.registry.startPass(), []);
        }
    }

    /**
     * @param index mark index from the latest pass
     * @param passId the pass that the index came from, if the caller wants stale indices to be rejected
     * @return the element that the mark was made from, or null
     */
    resolveMark = (index: number, passId?: string): Element | null => {
        return this.registry.resolve(index, passId);
    }

    getSelectOverlayController = (doc: Document): SelectOverlayController => {
        const existingController = this.overlayControllers.get(doc);
        if (existingController) {return existingController;}
        let docDomHelper = this.domHelper;
        if (doc !== this.domHelper.dom) {
            const docWindow = doc.defaultView;
            if (!docWindow) {throw new Error(`document ${doc.URL} has no window, so its selects can't be overlaid`);}
            docDomHelper = new DomWrapper(docWindow);
        }
        const newController = new SelectOverlayController(docDomHelper, this.overlayLogger);
        this.overlayControllers.set(doc, newController);
        return newController;
    }

    /**
     * take over the native popups of single-choice selects in the page (or the given subtree) and in every
     * same-origin iframe document within it
     * @param root optional subtree to restrict the takeover to
     * @return number of selects newly instrumented by this call
     */
    overwriteDefaultSelects = (root?: Element): number => {
        const scanRoot = root ?? this.domHelper.getDocumentElement();
        let numInstrumented = this.getSelectOverlayController(scanRoot.ownerDocument).instrument(scanRoot);
        for (const frameDoc of this.findSameOriginFrameDocuments(scanRoot)) {
            if (!frameDoc.defaultView) {continue;}
            numInstrumented += this.getSelectOverlayController(frameDoc).instrument();
        }
        return numInstrumented;
    }

    /**
     * @return documents of the accessible iframes under the root (including iframes nested in those documents or in
     *          shadow roots)
     */
    private findSameOriginFrameDocuments(scanRoot: Element): Document[] {
        const frameDocs: Document[] = [];
        const searchScope = (scope: Element | ShadowRoot): void => {
            const scopeElements = this.domHelper.fetchElementsByCss("*", scope);
            if ("tagName" in scope) {scopeElements.unshift(scope);}
            for (const elem of scopeElements) {
                if (elem.shadowRoot) {searchScope(elem.shadowRoot);}
                if (!isIframeElement(elem)) {continue;}
                const frameDoc = this.walker.getIframeContent(elem);
                if (frameDoc && !frameDocs.includes(frameDoc)) {
                    frameDocs.push(frameDoc);
                    searchScope(frameDoc.documentElement);
                }
            }
        };
        searchScope(scanRoot);
        return frameDocs;
    }
}
