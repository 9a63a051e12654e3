export { SourceUnavailableError, SourceFormatError, samplePayload } from "./sourceErrors";
export { InvalidScheduleError } from "./scheduleErrors";
export { ConfigurationError } from "./configErrors";
export { DuplicateKeyRace, isUniqueConstraintError } from "./storageErrors";
export { classifyError, getErrorCode, getErrorMessage } from "./classifyError";
export { wrapSourceRequestFailure } from "./wrapSourceFailure";
