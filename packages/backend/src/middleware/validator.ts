import type { RequestHandler } from "express";
import { ZodError, type ZodIssue, type ZodTypeAny } from "zod";
import type { AgentResponse, ValidationIssue } from "@docent/shared";

type RequestPart = "body" | "query" | "params";

type ValidationSchemas = Partial<Record<RequestPart, ZodTypeAny>>;

const requestParts: RequestPart[] = ["params", "query", "body"];

/**
 * Parses the named request parts in place. Rejections carry one issue per
 * failing field, prefixed with the part it came from for query and params.
 */
export const validate = (schemas: ValidationSchemas): RequestHandler => {
  return (req, res, next) => {
    let part: RequestPart = "body";
    try {
      for (part of requestParts) {
        const schema = schemas[part];
        if (schema) {
          req[part] = schema.parse(req[part]);
        }
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const failedPart = part;
        const body: AgentResponse & { details: ValidationIssue[] } = {
          success: false,
          message: "Validation failed",
          details: error.issues.map((issue) => toValidationIssue(failedPart, issue))
        };
        return res.status(400).json(body);
      }

      return next(error);
    }
  };
};

function toValidationIssue(part: RequestPart, issue: ZodIssue): ValidationIssue {
  const path = issue.path.join(".");
  return {
    path: part === "body" ? path : [part, path].filter(Boolean).join("."),
    message: issue.message
  };
}
