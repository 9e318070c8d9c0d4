/**
 * Express wiring for the plan controller.
 *
 * Bodies are validated with zod before they reach the controller; a fresh
 * controller instance serves every request, and its status (set through
 * tsoa's setStatus) becomes the response status.
 */

import { Router, Request, RequestHandler } from "express";
import { PlanController } from "../controllers/plan/plan.controller";
import {
  planRegistryService,
  PlanRegistryService,
} from "../services/registry/planRegistry.service";
import {
  createPlanSchema,
  dispatchEventSchema,
  importPlanSchema,
  parseRequest,
} from "../validation/requestSchemas";

type ControllerAction = (
  controller: PlanController,
  req: Request
) => Promise<unknown>;

export function createPlanRouter(
  registry: PlanRegistryService = planRegistryService
): Router {
  const router = Router();

  const handle =
    (action: ControllerAction): RequestHandler =>
    async (req, res, next) => {
      const controller = new PlanController(registry);
      try {
        const result = await action(controller, req);
        const status = controller.getStatus() ?? 200;

        if (result === undefined) {
          res.status(status).end();
          return;
        }
        res.status(status).json(result);
      } catch (error) {
        next(error);
      }
    };

  router.post(
    "/plans",
    handle((controller, req) =>
      controller.createPlan(parseRequest(createPlanSchema, req.body))
    )
  );
  router.post(
    "/plans/import",
    handle((controller, req) =>
      controller.importPlan(parseRequest(importPlanSchema, req.body))
    )
  );
  router.get(
    "/plans",
    handle((controller) => controller.listPlans())
  );
  router.get(
    "/plans/:id",
    handle((controller, req) => controller.getPlan(req.params.id))
  );
  router.get(
    "/plans/:id/summary",
    handle((controller, req) => controller.getPlanSummary(req.params.id))
  );
  router.get(
    "/plans/:id/events",
    handle((controller, req) => controller.getPlanEvents(req.params.id))
  );
  router.post(
    "/plans/:id/events",
    handle((controller, req) =>
      controller.applyEvent(
        req.params.id,
        parseRequest(dispatchEventSchema, req.body)
      )
    )
  );
  router.delete(
    "/plans/:id",
    handle((controller, req) => controller.deletePlan(req.params.id))
  );

  return router;
}
