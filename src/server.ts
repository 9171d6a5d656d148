import { config as loadEnv } from "dotenv";
import { createApp } from "./app";
import { AppConfig, describeConfig, loadConfig } from "./config";
import { createIdeasService } from "./services/ideasService";

export function buildApp(config: AppConfig) {
  return createApp({ ideas: createIdeasService(config), defaultCountry: config.defaultCountry });
}

export function parseServerArgs(argv: string[]): { host?: string; port?: number } {
  const result: { host?: string; port?: number } = {};
  const args = [...argv];
  while (args.length > 0) {
    const current = args.shift();
    if (current === "--host") {
      const next = args.shift();
      if (!next) throw new Error("--host requires a value");
      result.host = next;
      continue;
    }
    if (current === "--port") {
      const next = Number(args.shift());
      if (!Number.isInteger(next) || next < 0 || next > 65535) throw new Error("--port requires a port number");
      result.port = next;
      continue;
    }
    throw new Error(`Unknown argument: ${current}`);
  }
  return result;
}

function main(): void {
  loadEnv();
  const config = loadConfig();
  const { host = config.host, port = config.port } = parseServerArgs(process.argv.slice(2));

  console.log(describeConfig(config));

  const app = buildApp(config);
  app.listen(port, host, () => {
    console.log(`API running on http://${host}:${port}`);
  });
}

if (require.main === module) {
  try {
    main();
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}
