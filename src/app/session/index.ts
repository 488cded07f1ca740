export { ReplaceSession } from "./replaceSession";
