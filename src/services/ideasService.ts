import { buildPrompt } from "../utils/prompt";
import { normalizeIdeas } from "../utils/normalize";
import { HolidayProvider, Idea, IdeaRequest, isIdeaList, JsonValue } from "../types";
import { AppConfig } from "../config";
import { createHolidayProvider } from "./holidaysService";
import { createTextGenerationClient, TextGenerationClient } from "./textGeneration";

export type Logger = Pick<Console, "warn" | "error">;

export interface IdeasServiceOptions {
  holidays: HolidayProvider;
  textGeneration: TextGenerationClient;
  allowMocks?: boolean;
  logger?: Logger;
}

export function mockIdeas(industry: string, date: string, holidays: string[]): Idea[] {
  const occasion = holidays.length > 0 ? holidays.join(", ") : "the occasion";
  return [
    {
      title: `Quick promotion for ${industry}`,
      description: `Short campaigns tied to ${occasion} on ${date}.`
    },
    {
      title: `Social contest for ${industry}`,
      description: "A hashtag contest with prizes, promoted on social media."
    }
  ];
}

export class IdeasService {
  private readonly holidays: HolidayProvider;
  private readonly textGeneration: TextGenerationClient;
  private readonly allowMocks: boolean;
  private readonly logger: Logger;

  constructor({ holidays, textGeneration, allowMocks = false, logger = console }: IdeasServiceOptions) {
    this.holidays = holidays;
    this.textGeneration = textGeneration;
    this.allowMocks = allowMocks;
    this.logger = logger;
  }

  async generate({ industry, date, country }: IdeaRequest): Promise<JsonValue> {
    const holidays = await this.holidays(date, country);
    const prompt = buildPrompt(industry, date, holidays);

    try {
      const raw = await this.textGeneration.complete(prompt);
      const ideas = normalizeIdeas(raw);
      if (!isIdeaList(ideas)) {
        this.logger.warn("Model output is not a list of {title, description} records; returning it as-is");
      }
      return ideas;
    } catch (err) {
      this.logger.error("Anthropic request failed:", err instanceof Error ? err.message : String(err));
      if (!this.allowMocks) throw err;
    }

    return mockIdeas(industry, date, holidays);
  }
}

export function createIdeasService(config: AppConfig): IdeasService {
  return new IdeasService({
    holidays: createHolidayProvider({ baseUrl: config.holidays.baseUrl, timeout: config.holidays.timeoutMs }),
    textGeneration: createTextGenerationClient(config.llmClient, config.anthropic),
    allowMocks: config.allowMocks
  });
}
