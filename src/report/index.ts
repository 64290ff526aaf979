export { compareRuns, percentageReduction } from "./reductions";
export {
  formatCost,
  formatReduction,
  PREVIEW_LIMIT,
  renderComparisonReport,
  toComparisonJson,
  truncatePreview,
} from "./render";
