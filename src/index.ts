export { decompose, safeDecompose, extractFragment, extractQuery } from "./uri/decompose.js";
export { authority, composeUri } from "./uri/serialize.js";
export {
  validateScheme,
  validateSchemeOneOf,
  safeValidateScheme,
  safeValidateSchemeOneOf,
} from "./uri/schemeValidator.js";
export { UriBuilder, type QueryPair } from "./uri/uriBuilder.js";
export {
  createUri,
  uriEquals,
  URI_COMPONENTS,
  MAX_PORT,
  type UriRecord,
  type UriFields,
} from "./uri/uriRecord.js";
export { ALPHA, DIGIT, UNRESERVED, isUnreserved } from "./uri/abnf.js";
export { UriError, type UriErrorCode, type UriErrorDetail, type UriResult } from "./uri/errors.js";
export { config, loadConfig, type UriConfig, type LogLevel } from "./config.js";
export { logger, Logger, type LoggerConfig } from "./logging.js";
