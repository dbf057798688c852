/**
 * Duplicates Controller
 */
import type { NextFunction, Request, Response } from "express";
import type { DuplicateResource } from "../../resolution/duplicate-detector";
import { ValidationFailedError } from "../../shared/errors/scrape.errors";
import type { ApiContext } from "../context";

const RESOURCES: DuplicateResource[] = ["offender", "case", "notice"];

export function duplicatesController(ctx: ApiContext) {
  return {
    /** GET /duplicates/:resourceType */
    async find(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const resourceType = RESOURCES.find((resource) => resource === req.params.resourceType);
        if (!resourceType) {
          throw new ValidationFailedError(`Unknown resource type "${req.params.resourceType}"`, [
            `"resourceType" must be one of ${RESOURCES.join(", ")}`,
          ]);
        }
        const groups = await ctx.duplicates.findDuplicates(resourceType);
        res.json({ resourceType, groups });
      } catch (error) {
        next(error);
      }
    },
  };
}
