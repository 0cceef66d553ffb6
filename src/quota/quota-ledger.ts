// This module applies the download quota policy against the SQLite ledger and fails closed on storage errors.

import type { FastifyBaseLogger } from 'fastify';
import type { SqliteStore } from '../db/database.js';
import type { DownloadRequest, QuotaDenialReason, QuotaPolicy, QuotaWindow, ReserveResult } from '../types/domain.js';
import { firstOfMonth } from '../utils/dates.js';
import { errorForLog } from '../utils/logger.js';

export interface QuotaLedgerOptions {
  store: SqliteStore;
  policy: QuotaPolicy;
  logger: FastifyBaseLogger;
  now?: () => Date;
}

// This helper evaluates the quota rule for one derived window; null means eligible.
export function evaluateQuota(policy: QuotaPolicy, userId: string, window: QuotaWindow): QuotaDenialReason | null {
  const exempt = policy.exemptUserIds.has(userId);
  if (exempt && policy.exemptScope === 'all') {
    return null;
  }

  if (!exempt && window.todayCount > 0) {
    return 'daily_limit';
  }

  if (policy.monthlyCap > 0 && window.monthCount >= policy.monthlyCap) {
    return 'monthly_limit';
  }

  return null;
}

export class QuotaLedger {
  private readonly store: SqliteStore;
  private readonly policy: QuotaPolicy;
  private readonly logger: FastifyBaseLogger;
  private readonly now: () => Date;

  public constructor(options: QuotaLedgerOptions) {
    this.store = options.store;
    this.policy = options.policy;
    this.logger = options.logger.child({ component: 'quota_ledger' });
    this.now = options.now ?? (() => new Date());
  }

  public isExempt(userId: string): boolean {
    return this.policy.exemptUserIds.has(userId);
  }

  // This method reads the current daily and monthly counts straight from storage.
  public quotaWindow(userId: string, today: string): QuotaWindow {
    return this.store.getQuotaWindow(userId, today, firstOfMonth(today));
  }

  // This method answers eligibility without reserving; storage failures count as ineligible.
  public async canDownload(userId: string, today: string): Promise<boolean> {
    if (this.policy.exemptScope === 'all' && this.isExempt(userId)) {
      return true;
    }

    try {
      const reason = evaluateQuota(this.policy, userId, this.quotaWindow(userId, today));
      if (reason) {
        this.logger.info({ event: 'quota_check_denied', userId, today, reason }, 'quota_check_denied');
      }
      return reason === null;
    } catch (error) {
      this.logger.error(
        { event: 'quota_check_failed', userId, today, error: errorForLog(error) },
        'quota_check_failed'
      );
      return false;
    }
  }

  // This method re-checks eligibility and appends the event inside one immediate transaction.
  public async reserveAndLog(request: DownloadRequest, today: string): Promise<ReserveResult> {
    try {
      const result = this.store.runImmediate((): ReserveResult => {
        const reason = evaluateQuota(this.policy, request.userId, this.quotaWindow(request.userId, today));
        if (reason) {
          return { status: 'denied', reason };
        }

        return {
          status: 'committed',
          event: this.store.insertDownload(request, today, this.now().toISOString())
        };
      });

      if (result.status === 'committed') {
        this.logger.info(
          {
            event: 'quota_reservation_committed',
            userId: request.userId,
            stationId: request.stationId,
            eventDate: today,
            downloadId: result.event.id
          },
          'quota_reservation_committed'
        );
      } else {
        this.logger.info(
          { event: 'quota_reservation_denied', userId: request.userId, stationId: request.stationId, reason: result.reason },
          'quota_reservation_denied'
        );
      }

      return result;
    } catch (error) {
      this.logger.error(
        {
          event: 'quota_reservation_failed',
          userId: request.userId,
          stationId: request.stationId,
          error: errorForLog(error)
        },
        'quota_reservation_failed'
      );
      return { status: 'denied', reason: 'ledger_unavailable' };
    }
  }
}
