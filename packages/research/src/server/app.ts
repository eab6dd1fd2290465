import express, {
  type ErrorRequestHandler,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import { z } from "zod";
import { NotFoundError, ResearchError, ValidationError, errorMessage } from "../lib/errors";
import { SSE_HEADERS, encodeEvent, type EventSink } from "../lib/events";
import { runCompetitorResearch } from "../lib/research";
import { isUsableCompanyUrl } from "../lib/url";
import type { AppServices } from "./services";

export const URL_REQUIRED_MESSAGE = "Company URL is required. Use 'url' parameter.";
export const URL_INVALID_MESSAGE = "Company URL is not a valid URL.";
export const INVALID_JSON_MESSAGE = "Invalid JSON in request body";

const companyUrlSchema = z
  .string({ required_error: URL_REQUIRED_MESSAGE, invalid_type_error: URL_REQUIRED_MESSAGE })
  .trim()
  .min(1, URL_REQUIRED_MESSAGE)
  .refine(isUsableCompanyUrl, URL_INVALID_MESSAGE);

const urlBodySchema = z.object({ url: z.unknown() }).partial();

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

const parseCompanyUrl = (value: unknown) => {
  const result = companyUrlSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? URL_REQUIRED_MESSAGE);
  }
  return result.data;
};

const readCompanyUrl = (req: Request) => {
  if (req.method === "POST") {
    const body = urlBodySchema.safeParse(req.body);
    return parseCompanyUrl(body.success ? body.data.url : undefined);
  }
  return parseCompanyUrl(req.query.url);
};

const asyncRoute =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

const isBodyParseError = (error: unknown) =>
  typeof error === "object" &&
  error !== null &&
  "type" in error &&
  error.type === "entity.parse.failed";

const errorHandler: ErrorRequestHandler = (error, _req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  if (isBodyParseError(error)) {
    res.status(400).json({ error: INVALID_JSON_MESSAGE });
    return;
  }
  if (error instanceof ResearchError && error.statusCode < 500) {
    res.status(error.statusCode).json({ error: error.message });
    return;
  }
  console.error("[server] request failed:", errorMessage(error));
  res.status(500).json({ error: `An error occurred: ${errorMessage(error)}` });
};

const streamCompetitors =
  (services: AppServices): RequestHandler =>
  async (req, res, next) => {
    let companyUrl: string;
    try {
      companyUrl = readCompanyUrl(req);
      res.writeHead(200, SSE_HEADERS);
      res.flushHeaders();
    } catch (error) {
      next(error);
      return;
    }

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    const emit: EventSink = (event) => {
      if (!controller.signal.aborted && !res.writableEnded) {
        res.write(encodeEvent(event));
      }
    };

    try {
      await runCompetitorResearch(companyUrl, services.pipeline, emit, {
        signal: controller.signal,
      });
    } catch (error) {
      console.error("[server] competitor stream failed:", errorMessage(error));
    } finally {
      res.end();
    }
  };

export const createApp = (services: AppServices) => {
  const app = express();

  app.use((_req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    next();
  });
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/competitors", streamCompetitors(services));
  app.post("/api/competitors", streamCompetitors(services));

  app.get(
    "/api/companies",
    asyncRoute(async (req, res) => {
      const query = listQuerySchema.safeParse(req.query);
      if (!query.success) {
        throw new ValidationError("limit must be an integer between 1 and 500");
      }
      const companies = await services.repository().listCompanies(query.data.limit);
      res.json({ companies });
    }),
  );

  app.get(
    "/api/companies/:id",
    asyncRoute(async (req, res) => {
      const repository = services.repository();
      const company = await repository.getCompany(req.params.id);
      if (!company) {
        throw new NotFoundError("Company");
      }
      const competitors = await repository.getCompaniesByIds(company.competitor_ids);
      const research = await repository.getCompanyAnalysis(company.id);
      res.json({ company, competitors, research });
    }),
  );

  app.delete(
    "/api/companies/:id",
    asyncRoute(async (req, res) => {
      const deleted = await services.repository().deleteCompany(req.params.id);
      if (!deleted) {
        throw new NotFoundError("Company");
      }
      res.status(204).end();
    }),
  );

  app.use(errorHandler);

  return app;
};
