/**
 * Function tools — public API.
 */

export {
  FUNCTION_TOOLS,
  shareInformationTool,
  endCallTool,
  getSharedInformationTool,
  findTool,
  getToolNames,
  ShareInformationParams,
  EndCallParams,
  GetSharedInformationParams,
  type FunctionTool,
  type FunctionName,
  type ShareInformationArgs,
  type EndCallArgs,
  type GetSharedInformationArgs,
} from "./function-tools.js";

export {
  parseFunctionCall,
  normalizeParameters,
  type FunctionCall,
  type ParseCallResult,
} from "./parse-call.js";
