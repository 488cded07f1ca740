export { ReplaceEngine, type EngineOptions, type EngineStats } from "./replaceEngine";
