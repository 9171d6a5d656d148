import express, { ErrorRequestHandler, Request, Response } from "express";
import { z } from "zod";
import { ValidationError } from "./errors";
import { IdeasService } from "./services/ideasService";
import { ApiResponseError, IdeaRequest } from "./types";

export interface AppDependencies {
  ideas: Pick<IdeasService, "generate">;
  defaultCountry: string;
}

const IdeaParamsSchema = z.object({
  industry: z.string().trim().min(1),
  date: z.string().trim().min(1),
  country: z.string().trim().optional()
});

function parseIdeaRequest(input: unknown, defaultCountry: string, message: string): IdeaRequest {
  const parsed = IdeaParamsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ValidationError(message);
  }
  const { industry, date, country } = parsed.data;
  return { industry, date, country: country ? country.toUpperCase() : defaultCountry };
}

function errorBody(err: unknown): ApiResponseError {
  return { error: err instanceof Error ? err.message : String(err) };
}

export function createApp({ ideas, defaultCountry }: AppDependencies) {
  const app = express();
  app.use(express.json());

  app.get("/ping", (_req: Request, res: Response) => {
    res.type("text/plain").send("pong");
  });

  async function respondWithIdeas(res: Response, request: IdeaRequest) {
    try {
      const result = await ideas.generate(request);
      return res.json(result);
    } catch (err) {
      console.error("Idea generation failed:", err);
      return res.status(500).json(errorBody(err));
    }
  }

  app.get("/ideas", async (req: Request, res: Response) => {
    let request: IdeaRequest;
    try {
      request = parseIdeaRequest(req.query, defaultCountry, "Parameters 'industry' and 'date' are required.");
    } catch (err) {
      return res.status(400).json(errorBody(err));
    }
    return respondWithIdeas(res, request);
  });

  app.post("/ideas", async (req: Request, res: Response) => {
    if (!req.is("application/json")) {
      return res.status(400).json({ error: "Expected a JSON body." });
    }
    let request: IdeaRequest;
    try {
      request = parseIdeaRequest(req.body, defaultCountry, "'industry' and 'date' are required in the JSON body.");
    } catch (err) {
      return res.status(400).json(errorBody(err));
    }
    return respondWithIdeas(res, request);
  });

  // body-parser rejects malformed JSON before the routes run
  const handleBodyError: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body." });
      return;
    }
    next(err);
  };
  app.use(handleBodyError);

  return app;
}
