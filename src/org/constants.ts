/**
 * Org/gptel format constants.
 *
 * These values define the "wire format" of annotated Org documents:
 * - The property drawer delimiters.
 * - The gptel property names, including the response bounds property whose
 *   grammar is shared with the Emacs gptel package.
 */
export const PROPERTIES_DRAWER_START = ':PROPERTIES:';
export const PROPERTIES_DRAWER_END = ':END:';

export const GPTEL_BOUNDS_PROPERTY = 'GPTEL_BOUNDS';
export const GPTEL_MODEL_PROPERTY = 'GPTEL_MODEL';
export const GPTEL_BACKEND_PROPERTY = 'GPTEL_BACKEND';
export const GPTEL_SYSTEM_PROPERTY = 'GPTEL_SYSTEM';
export const GPTEL_TOPIC_PROPERTY = 'GPTEL_TOPIC';

/**
 * Token that selects the tagged bounds grammar: `((response (s e) ...))`.
 */
export const BOUNDS_RESPONSE_TAG = 'response';

/**
 * Emacs buffer positions start at 1.
 */
export const DEFAULT_POSITION_BASE = 1;

/**
 * Upper bound for the bounds fixed-point loop in `buildOrgDocument`.
 */
export const DEFAULT_MAX_BOUNDS_ITERATIONS = 10;

/** Heading emitted above every assistant message. */
export const RESPONSE_HEADING = 'Response';

/** Topic used when a conversation has no usable title. */
export const DEFAULT_TOPIC = 'Conversation';

/** User headings longer than this are truncated and suffixed with `...`. */
export const MAX_HEADING_LENGTH = 60;

/**
 * Markdown headings are nested this many levels below the Org heading depth.
 *
 * `# Title` becomes `**** Title`, one level under the `*** Response` heading.
 */
export const MARKDOWN_HEADING_DEPTH_OFFSET = 3;

/**
 * Default directory (relative to `rootDir`) where daily Org files live.
 */
export const DEFAULT_DAILIES_DIR = 'dailies';

export const ORG_FILE_EXTENSION = '.org';
