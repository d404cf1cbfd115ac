export {
  RecommendationLedger,
  clampSavings,
  type LedgerAction,
  type LedgerResult,
  type RecommendationAction,
} from "./recommendation-ledger.js";
export { summarizeSavings, type SavingsSummary, type PriorityItem } from "./savings-summary.js";
