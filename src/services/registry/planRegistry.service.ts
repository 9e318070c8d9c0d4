/**
 * PLAN REGISTRY
 *
 * In-memory home of the live plans. Each plan is created once from a
 * rider/order pair (or imported from a snapshot) and then threaded through
 * events one at a time. Nothing survives a restart.
 *
 * Events for a plan are applied synchronously, each one completing before
 * the next is looked at, so every event sees the plan left by the previous.
 * A failed event leaves the record exactly as it was.
 */

import { v4 as uuidv4 } from "uuid";
import { Plan, PlanSnapshot } from "../../interfaces/Plan";
import { Rider } from "../../interfaces/Rider";
import { DeliveryOrder } from "../../interfaces/DeliveryOrder";
import { DispatchEvent } from "../../interfaces/DispatchEvent";
import { EventOutcome } from "../../enums/EventOutcome";
import { PlanNotFoundError } from "../../errors/DispatchError";
import {
  applyEvent,
  buildPlan,
  fromPlanSnapshot,
  planOrderIds,
  summarizePlan,
} from "../planning";
import { appConfig } from "../../config/appConfig";
import {
  formatEvent,
  formatPlan,
  formatPlanSummary,
} from "../../utils/formatters";

export interface EventLogEntry {
  sequence: number; // 1-based, per plan
  event: DispatchEvent;
  outcome: EventOutcome;
  appliedAt: Date;
}

export interface PlanRecord {
  readonly id: string;
  readonly plan: Plan;
  readonly version: number; // Bumped on every event that changed the plan
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly eventCount: number; // Including entries dropped from the log
  readonly events: readonly EventLogEntry[];
}

export interface RegistryStats {
  planCount: number;
  totalEvents: number;
  totalOrders: number;
}

export class PlanRegistryService {
  private plans = new Map<string, PlanRecord>();
  private maxEventLog: number;

  constructor(maxEventLog: number = appConfig.maxEventLog) {
    this.maxEventLog = maxEventLog;
  }

  /**
   * Build a plan with the round-robin builder and register it
   */
  createPlan(riders: readonly Rider[], orders: readonly DeliveryOrder[]): PlanRecord {
    return this.register(buildPlan(riders, orders));
  }

  /**
   * Register a plan supplied from outside
   */
  importPlan(snapshot: PlanSnapshot): PlanRecord {
    return this.register(fromPlanSnapshot(snapshot));
  }

  getPlan(id: string): PlanRecord {
    const record = this.plans.get(id);
    if (!record) {
      throw new PlanNotFoundError(id);
    }
    return record;
  }

  /**
   * All plans, most recently updated first
   */
  listPlans(): PlanRecord[] {
    return [...this.plans.values()].sort(
      (a, b) => b.updatedAt.getTime() - a.updatedAt.getTime()
    );
  }

  /**
   * Apply one event to a plan and record it in the plan's event log
   */
  applyEvent(id: string, event: DispatchEvent): PlanRecord {
    const record = this.getPlan(id);
    const nextPlan = applyEvent(record.plan, event);
    const changed = nextPlan !== record.plan;
    const now = new Date();

    const entry: EventLogEntry = {
      sequence: record.eventCount + 1,
      event,
      outcome: changed ? EventOutcome.APPLIED : EventOutcome.IGNORED,
      appliedAt: now,
    };

    const events = [...record.events, entry];
    const updated: PlanRecord = {
      ...record,
      plan: nextPlan,
      version: changed ? record.version + 1 : record.version,
      updatedAt: now,
      eventCount: entry.sequence,
      events: events.slice(Math.max(0, events.length - this.maxEventLog)),
    };
    this.plans.set(id, updated);

    if (changed) {
      console.log(`✓ Plan ${id} v${updated.version}: ${formatEvent(event)}`);
    } else {
      console.warn(`⚠️  Plan ${id}: ignored ${formatEvent(event)} (no match)`);
    }
    if (appConfig.nodeEnv === "development") {
      console.log(`   ${formatPlan(nextPlan)}`);
    }

    return updated;
  }

  deletePlan(id: string): boolean {
    const deleted = this.plans.delete(id);
    if (deleted) {
      console.log(`✓ Plan ${id} deleted`);
    }
    return deleted;
  }

  getStats(): RegistryStats {
    let totalEvents = 0;
    let totalOrders = 0;

    for (const record of this.plans.values()) {
      totalEvents += record.eventCount;
      totalOrders += planOrderIds(record.plan).length;
    }

    return {
      planCount: this.plans.size,
      totalEvents,
      totalOrders,
    };
  }

  /**
   * Drop every plan
   */
  clear(): void {
    this.plans.clear();
  }

  private register(plan: Plan): PlanRecord {
    const summary = summarizePlan(plan);
    const now = new Date();
    const record: PlanRecord = {
      id: uuidv4(),
      plan,
      version: 0,
      createdAt: now,
      updatedAt: now,
      eventCount: 0,
      events: [],
    };
    this.plans.set(record.id, record);

    console.log(`✓ Plan ${record.id} created: ${formatPlanSummary(summary)}`);
    return record;
  }
}

export const planRegistryService = new PlanRegistryService();
