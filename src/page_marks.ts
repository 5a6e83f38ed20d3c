import {createNamedLogger} from "./utils/shared_logging_setup";
import {installPageMarksApi} from "./utils/page_marks_api";

const logger = createNamedLogger('page-marks-injection');
logger.trace(`successfully injected page_marks script in browser for page ${document.URL}`);

installPageMarksApi(window);
