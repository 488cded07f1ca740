/**
 * Domain Use Cases
 *
 * Orchestrate domain services with injected I/O.
 */

export { filterFiles, type FilterDependencies } from "./filterFiles";
export {
  previewContent,
  commitSubstitution,
  commitSubstitutions,
  type CommitDependencies,
} from "./substitute";
