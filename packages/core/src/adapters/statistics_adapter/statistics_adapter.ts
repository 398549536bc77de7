import { assertAllowed } from '../../access_control';
import { toPersistenceFailure } from '../../errors';
import type { PersistenceGateway, StatusCounts } from '../../persistence';
import { TASK_STATUSES } from '../../record_types';
import { requirePrincipal } from '../identity_adapter';
import type { Principal } from '../identity_adapter';
import { isTerminalStatus } from '../task_lifecycle_adapter';
import type {
  IStatisticsAdapter,
  StatisticsAdapterDependencies,
  StatusCountSummary,
  UserStatistics,
} from './statistics_adapter.types';

const DAY_MS = 24 * 60 * 60 * 1000;

function withTotal(counts: StatusCounts): StatusCountSummary {
  const total = TASK_STATUSES.reduce((sum, status) => sum + counts[status], 0);
  return { ...counts, total };
}

/**
 * StatisticsAdapter - read-only counts derived from task state.
 */
export class StatisticsAdapter implements IStatisticsAdapter {
  private gateway: PersistenceGateway;
  private clock: () => Date;

  constructor(dependencies: StatisticsAdapterDependencies) {
    this.gateway = dependencies.gateway;
    this.clock = dependencies.clock ?? (() => new Date());
  }

  /**
   * Counts for `userId` (default: the principal). Only admins may ask
   * about someone else.
   */
  async userStatistics(principal: Principal | null, userId?: string): Promise<UserStatistics> {
    const actor = requirePrincipal(principal);
    const subjectId = userId ?? actor.userId;
    assertAllowed(actor, 'user.view_statistics', { subjectUserId: subjectId }, `user:${subjectId}`);

    const now = this.clock();
    const nowMs = now.getTime();
    const stores = this.gateway.stores;

    try {
      const [assigned, created, deadlines] = await Promise.all([
        stores.tasks.countByStatus('assignee', subjectId),
        stores.tasks.countByStatus('creator', subjectId),
        stores.tasks.listAssignedDeadlines(subjectId),
      ]);

      let overdueCount = 0;
      let dueTodayCount = 0;
      for (const { deadline, status } of deadlines) {
        if (isTerminalStatus(status)) continue;
        const dueMs = Date.parse(deadline);
        if (dueMs < nowMs) {
          overdueCount += 1;
        } else if (dueMs < nowMs + DAY_MS) {
          dueTodayCount += 1;
        }
      }

      return {
        userId: subjectId,
        assignedCounts: withTotal(assigned),
        createdCounts: withTotal(created),
        overdueCount,
        dueTodayCount,
        evaluatedAt: now.toISOString(),
      };
    } catch (error) {
      throw toPersistenceFailure('userStatistics', error);
    }
  }
}
