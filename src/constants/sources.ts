/**
 * Job source constants
 */

/**
 * Registered job sources, in default fetch order
 */
export const JOB_SOURCES = ["serpapi", "careerjet"] as const;

/**
 * Maximum characters of a raw payload kept on a SourceFormatError
 */
export const PAYLOAD_SAMPLE_MAX_LENGTH = 500;

/**
 * Length of the hex digest used as externalId when a source has no stable id
 */
export const DERIVED_EXTERNAL_ID_LENGTH = 24;
