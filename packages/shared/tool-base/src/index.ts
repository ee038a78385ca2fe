/**
 * @parley/tool-base
 *
 * Base class for building Parley tools
 */

export {
  ToolService,
  type ToolServiceOptions,
  type ToolValidationResult,
  type ToolValidationSuccess,
  type ToolValidationFailure,
} from './tool-service.js';
