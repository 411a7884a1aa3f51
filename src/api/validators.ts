import type { RequestHandler } from "express";
import type { ZodTypeAny } from "zod";

/**
 * Parses `{ body, query, params }` with `schema` and stores the result in
 * `res.locals.validated`.
 */
export function validate(schema: ZodTypeAny): RequestHandler {
  return (req, res, next) => {
    const parsed = schema.safeParse({
      body: req.body,
      query: req.query,
      params: req.params,
    });
    if (!parsed.success) {
      res.status(400).json({
        error: parsed.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; "),
      });
      return;
    }
    res.locals.validated = parsed.data;
    next();
  };
}
