export { StatisticsAdapter } from './statistics_adapter';
export type {
  IStatisticsAdapter,
  StatisticsAdapterDependencies,
  StatusCountSummary,
  UserStatistics,
} from './statistics_adapter.types';
