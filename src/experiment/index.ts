// Public experiment harness surface

export { makeAveraged } from "./averaged";
export type { ExperimentOptions, ExperimentSummary, Reporter } from "./experiments";
export {
  averageWinRate,
  EXPERIMENT_STRATEGIES,
  formatAverage,
  maxScoringNumRolls,
  runExperiments,
  winner,
} from "./experiments";
