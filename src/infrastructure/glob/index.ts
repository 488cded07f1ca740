export { compileMinimatchGlob } from "./minimatchGlob";
