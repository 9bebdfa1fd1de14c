//apps/runner/src/index.ts
import { readFile } from "node:fs/promises";
import {
  AdaptiveEvalError,
  AdaptiveTest,
  ThreadedItemProcessor,
  withClient,
  type AdaptiveClient,
  type ItemProcessor,
} from "adaptive-client";
import {
  formatResults,
  formatSummary,
  HELP_TEXT,
  parseClassicFile,
  parseRunnerArgs,
  progressLine,
  runMetadata,
  strategyProcessor,
  toJson,
  type RunnerConfig,
} from "./runner";

function print(cfg: RunnerConfig, value: unknown, lines: string[]): void {
  if (cfg.json) {
    console.log(toJson(value));
    return;
  }
  for (const line of lines) console.log(line);
}

function onProgress(current: number, total: number): void {
  process.stderr.write(`${progressLine(current, total)}\n`);
}

async function withProcessor<T>(cfg: RunnerConfig, fn: (p: ItemProcessor) => Promise<T>): Promise<T> {
  if (!cfg.processor) return fn(strategyProcessor(cfg.strategy));
  const threaded = new ThreadedItemProcessor({ module: cfg.processor.module, exportName: cfg.processor.exportName });
  try {
    return await fn(threaded);
  } finally {
    await threaded.close();
  }
}

/** Values parseRunnerArgs already required for the command. */
function required(value: string | null, flag: string): string {
  if (value === null) throw new Error(`internal: ${flag} should have been validated`);
  return value;
}

async function execute(cfg: RunnerConfig, client: AdaptiveClient): Promise<void> {
  switch (cfg.command) {
    case "datasets": {
      const datasets = await client.listDatasets();
      print(cfg, datasets, datasets.length ? datasets.map((d) => `${d.id}\t${d.name}`) : ["(no datasets)"]);
      return;
    }
    case "me": {
      const me = await client.me();
      print(cfg, me, [
        `user: ${me.user.firstname} ${me.user.lastname} <${me.user.email}>`,
        `organization: ${me.organization.name} (${me.organization.type}, ${me.organization.role})`,
      ]);
      return;
    }
    case "run": {
      const results = await withProcessor(cfg, (itemProcessor) =>
        new AdaptiveTest({ client, itemProcessor, onProgress, maxItems: cfg.maxItems }).run(
          required(cfg.datasetId, "--dataset"),
          required(cfg.projectId, "--project"),
          required(cfg.experiment, "--experiment"),
          runMetadata(cfg),
          { withResponses: cfg.withResponses }
        )
      );
      print(cfg, results, formatResults(results));
      return;
    }
    case "replay": {
      const results = await withProcessor(cfg, (itemProcessor) =>
        new AdaptiveTest({ client, itemProcessor, onProgress }).runReplay(required(cfg.runId, "--run"), runMetadata(cfg), {
          withResponses: cfg.withResponses,
        })
      );
      print(cfg, results, formatResults(results));
      return;
    }
    case "summary": {
      const summary = await client.runSummary(required(cfg.runId, "--run"));
      print(cfg, summary, formatSummary(summary));
      return;
    }
    case "create-project": {
      const project = await client.createProject(required(cfg.name, "--name"), {
        teamId: cfg.teamId ?? undefined,
        description: cfg.description ?? undefined,
      });
      print(cfg, project, [`project: ${project.id}\t${project.name}`]);
      return;
    }
    case "classic": {
      const path = required(cfg.file, "--file");
      const request = parseClassicFile(await readFile(path, "utf-8"), cfg);
      const res = await client.submitClassicEval(request);
      print(cfg, res, [
        `classic evaluation: ${res.id}`,
        `experiment: ${res.experiment_name} (${res.experiment_id})`,
        `responses: ${res.response_count}`,
      ]);
      return;
    }
  }
}

async function main(): Promise<void> {
  const cfg = parseRunnerArgs(process.argv);
  if (!cfg) {
    console.log(HELP_TEXT);
    return;
  }

  await withClient({ serviceUrl: cfg.serviceUrl, apiKey: cfg.apiKey, maxItems: cfg.maxItems }, (client) =>
    execute(cfg, client)
  );
}

main().catch((err: unknown) => {
  if (err && typeof err === "object" && "exitCode" in err && typeof err.exitCode === "number") {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(err.exitCode);
  }

  if (err instanceof AdaptiveEvalError) {
    console.error(`${err.name}: ${err.message}`);
    process.exit(1);
  }

  console.error(String(err instanceof Error ? err.stack : err));
  process.exit(1);
});
