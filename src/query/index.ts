export {
  QueryEngine,
  type InformationQuery,
  type InformationPage,
  type InformationSummary,
  type QueryEngineOptions,
} from "./query-engine.js";
