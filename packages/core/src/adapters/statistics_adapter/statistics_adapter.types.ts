import type { PersistenceGateway, StatusCounts } from '../../persistence';
import type { Principal } from '../identity_adapter';

/**
 * StatisticsAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export type StatisticsAdapterDependencies = {
  // Data Layer (Read-Only)
  gateway: PersistenceGateway;

  // Evaluation time for overdue and due-today; defaults to the system clock
  clock?: () => Date;
};

export type StatusCountSummary = StatusCounts & {
  total: number;
};

export type UserStatistics = {
  userId: string;
  assignedCounts: StatusCountSummary;
  createdCounts: StatusCountSummary;
  /** Assigned, not completed or cancelled, deadline already passed */
  overdueCount: number;
  /** Assigned, not completed or cancelled, deadline within the next 24 hours */
  dueTodayCount: number;
  /** ISO 8601 timestamp the counts were taken at */
  evaluatedAt: string;
};

/**
 * StatisticsAdapter Interface - per-user task reporting
 */
export interface IStatisticsAdapter {
  userStatistics(principal: Principal | null, userId?: string): Promise<UserStatistics>;
}
