export { compilePattern, regexOrNull } from "./re2Regex";
