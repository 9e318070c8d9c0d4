/**
 * Plan Controller
 * Builds rider/order plans and feeds runtime events into them
 */

import {
  Controller,
  Get,
  Post,
  Delete,
  Route,
  Body,
  Path,
  Response,
  SuccessResponse,
  Tags,
} from "tsoa";
import {
  planRegistryService,
  PlanRegistryService,
  PlanRecord,
  EventLogEntry,
} from "../../services/registry/planRegistry.service";
import { summarizePlan, toPlanSnapshot } from "../../services/planning";
import { PlanSummary } from "../../interfaces/Plan";
import { DispatchEvent } from "../../interfaces/DispatchEvent";
import { DispatchEventType } from "../../enums/DispatchEventType";
import { PlanNotFoundError } from "../../errors/DispatchError";
import { CreatePlanRequest } from "../../dtos/plan/create-plan.request";
import { ImportPlanRequest } from "../../dtos/plan/import-plan.request";
import { PlanResponse } from "../../dtos/plan/plan.response";
import { DispatchEventRequest } from "../../dtos/event/dispatch-event.request";

interface ErrorBody {
  error: string;
  code?: string;
}

function toPlanResponse(record: PlanRecord): PlanResponse {
  return {
    id: record.id,
    version: record.version,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    riders: toPlanSnapshot(record.plan).riders,
    summary: summarizePlan(record.plan),
  };
}

function toDispatchEvent(body: DispatchEventRequest): DispatchEvent {
  if (body.type === "rider_rejected") {
    return {
      type: DispatchEventType.RIDER_REJECTED,
      riderId: body.riderId,
      orderId: body.orderId,
    };
  }
  return { type: DispatchEventType.ORDER_CANCELED, orderId: body.orderId };
}

@Route("plans")
@Tags("Plans")
export class PlanController extends Controller {
  private registry: PlanRegistryService;

  constructor(registry: PlanRegistryService = planRegistryService) {
    super();
    this.registry = registry;
  }

  /**
   * Build a plan by dealing the orders round robin over the riders
   *
   * Fewer orders than riders is allowed: the trailing riders start empty.
   */
  @Post()
  @SuccessResponse(201, "Plan created")
  @Response<ErrorBody>(400, "Malformed body or duplicated ids")
  @Response<ErrorBody>(422, "No riders")
  async createPlan(@Body() body: CreatePlanRequest): Promise<PlanResponse> {
    const record = this.registry.createPlan(
      body.riders.map((id) => ({ id })),
      body.orders.map((id) => ({ id }))
    );

    this.setStatus(201);
    return toPlanResponse(record);
  }

  /**
   * Register an existing assignment so events can be applied to it
   */
  @Post("import")
  @SuccessResponse(201, "Plan imported")
  @Response<ErrorBody>(422, "Duplicated rider or order ids")
  async importPlan(@Body() body: ImportPlanRequest): Promise<PlanResponse> {
    const record = this.registry.importPlan(body);

    this.setStatus(201);
    return toPlanResponse(record);
  }

  /**
   * All live plans, most recently updated first
   */
  @Get()
  async listPlans(): Promise<PlanResponse[]> {
    return this.registry.listPlans().map(toPlanResponse);
  }

  @Get("{id}")
  @Response<ErrorBody>(404, "Plan not found")
  async getPlan(@Path() id: string): Promise<PlanResponse> {
    return toPlanResponse(this.registry.getPlan(id));
  }

  @Get("{id}/summary")
  @Response<ErrorBody>(404, "Plan not found")
  async getPlanSummary(@Path() id: string): Promise<PlanSummary> {
    return summarizePlan(this.registry.getPlan(id).plan);
  }

  /**
   * Event log of a plan, oldest first
   */
  @Get("{id}/events")
  @Response<ErrorBody>(404, "Plan not found")
  async getPlanEvents(@Path() id: string): Promise<EventLogEntry[]> {
    return [...this.registry.getPlan(id).events];
  }

  /**
   * Apply one runtime event
   *
   * - rider_rejected: the order moves to the least-loaded other rider
   *   (ties broken by smallest rider id)
   * - order_canceled: the order leaves the plan
   *
   * Events that do not match the plan are recorded and ignored.
   */
  @Post("{id}/events")
  @Response<ErrorBody>(404, "Plan not found")
  @Response<ErrorBody>(409, "Rejecting rider is the only rider")
  async applyEvent(
    @Path() id: string,
    @Body() body: DispatchEventRequest
  ): Promise<PlanResponse> {
    return toPlanResponse(this.registry.applyEvent(id, toDispatchEvent(body)));
  }

  @Delete("{id}")
  @SuccessResponse(204, "Plan deleted")
  @Response<ErrorBody>(404, "Plan not found")
  async deletePlan(@Path() id: string): Promise<void> {
    if (!this.registry.deletePlan(id)) {
      throw new PlanNotFoundError(id);
    }
    this.setStatus(204);
  }
}
