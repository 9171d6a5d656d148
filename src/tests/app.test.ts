import axios from "axios";
import { createApp } from "../app";
import { createHolidayProvider } from "../services/holidaysService";
import { IdeasService } from "../services/ideasService";
import { IdeaRequest, JsonValue } from "../types";
import { startServer, stubHttp } from "./helpers";

const client = axios.create({ validateStatus: () => true });

type Running = Awaited<ReturnType<typeof startServer>>;

describe("HTTP API", () => {
  let generate: jest.Mock<Promise<JsonValue>, [IdeaRequest]>;
  let server: Running;
  let errorSpy: jest.SpyInstance;

  beforeEach(async () => {
    generate = jest.fn<Promise<JsonValue>, [IdeaRequest]>(async () => [{ title: "A", description: "B" }]);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    server = await startServer(createApp({ ideas: { generate }, defaultCountry: "PL" }));
  });

  afterEach(async () => {
    await server.close();
    errorSpy.mockRestore();
  });

  it("GET /ping answers with plain text", async () => {
    const resp = await client.get(`${server.baseUrl}/ping`, { responseType: "text" });
    expect(resp.status).toBe(200);
    expect(resp.data).toBe("pong");
    expect(resp.headers["content-type"]).toMatch(/^text\/plain/);
  });

  it("GET /ideas returns the generated ideas", async () => {
    const resp = await client.get(`${server.baseUrl}/ideas`, { params: { industry: "Bakery", date: "2024-01-01" } });
    expect(resp.status).toBe(200);
    expect(resp.data).toEqual([{ title: "A", description: "B" }]);
    expect(generate).toHaveBeenCalledWith({ industry: "Bakery", date: "2024-01-01", country: "PL" });
  });

  it("GET /ideas upper-cases an explicit country", async () => {
    await client.get(`${server.baseUrl}/ideas`, { params: { industry: "Bakery", date: "2024-01-01", country: "de" } });
    expect(generate).toHaveBeenCalledWith({ industry: "Bakery", date: "2024-01-01", country: "DE" });
  });

  it("GET /ideas rejects a missing industry without generating", async () => {
    const resp = await client.get(`${server.baseUrl}/ideas`, { params: { date: "2024-01-01" } });
    expect(resp.status).toBe(400);
    expect(resp.data).toEqual({ error: "Parameters 'industry' and 'date' are required." });
    expect(generate).not.toHaveBeenCalled();
  });

  it("POST /ideas returns the generated ideas", async () => {
    const resp = await client.post(`${server.baseUrl}/ideas`, { industry: "Bakery", date: "2024-01-01", country: "CZ" });
    expect(resp.status).toBe(200);
    expect(resp.data).toEqual([{ title: "A", description: "B" }]);
    expect(generate).toHaveBeenCalledWith({ industry: "Bakery", date: "2024-01-01", country: "CZ" });
  });

  it("POST /ideas rejects a missing date without generating", async () => {
    const resp = await client.post(`${server.baseUrl}/ideas`, { industry: "Bakery" });
    expect(resp.status).toBe(400);
    expect(resp.data).toEqual({ error: "'industry' and 'date' are required in the JSON body." });
    expect(generate).not.toHaveBeenCalled();
  });

  it("POST /ideas rejects a blank industry", async () => {
    const resp = await client.post(`${server.baseUrl}/ideas`, { industry: "   ", date: "2024-01-01" });
    expect(resp.status).toBe(400);
    expect(generate).not.toHaveBeenCalled();
  });

  it("POST /ideas requires a JSON body", async () => {
    const resp = await client.post(`${server.baseUrl}/ideas`, "industry=Bakery", {
      headers: { "Content-Type": "text/plain" }
    });
    expect(resp.status).toBe(400);
    expect(resp.data).toEqual({ error: "Expected a JSON body." });
  });

  it("POST /ideas rejects malformed JSON", async () => {
    const resp = await client.post(`${server.baseUrl}/ideas`, '{"industry": ', {
      headers: { "Content-Type": "application/json" }
    });
    expect(resp.status).toBe(400);
    expect(resp.data).toEqual({ error: "Malformed JSON body." });
    expect(generate).not.toHaveBeenCalled();
  });

  it("turns generation failures into a 500 with the message", async () => {
    generate.mockRejectedValueOnce(new Error("Anthropic request failed: HTTP 529"));
    const resp = await client.get(`${server.baseUrl}/ideas`, { params: { industry: "Bakery", date: "2024-01-01" } });
    expect(resp.status).toBe(500);
    expect(resp.data).toEqual({ error: "Anthropic request failed: HTTP 529" });
  });
});

describe("HTTP API end to end", () => {
  it("feeds the holiday names into the prompt and returns the model's array", async () => {
    const { http } = stubHttp(() => ({ data: [{ date: "2024-01-01", localName: "New Year" }] }));
    const prompts: string[] = [];
    const ideas = new IdeasService({
      holidays: createHolidayProvider({ baseUrl: "https://holidays.test/api/v3", http }),
      textGeneration: {
        complete: async (prompt) => {
          prompts.push(prompt);
          return '[{"title":"A","description":"B"}]';
        }
      }
    });
    const server = await startServer(createApp({ ideas, defaultCountry: "PL" }));

    try {
      const resp = await client.get(`${server.baseUrl}/ideas`, { params: { industry: "Bakery", date: "2024-01-01" } });
      expect(resp.status).toBe(200);
      expect(resp.data).toEqual([{ title: "A", description: "B" }]);
      expect(prompts).toHaveLength(1);
      expect(prompts[0]).toContain("New Year");
    } finally {
      await server.close();
    }
  });
});
