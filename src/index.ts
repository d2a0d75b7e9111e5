#!/usr/bin/env node
import "dotenv/config";

import path from "node:path";

import { loadRuntimeConfig } from "./config/runtimeConfig.js";
import { CourseJobService } from "./jobs/courseJobService.js";
import { JsonFileJobStore } from "./jobs/jobStore.js";
import { FileDocumentLibrary } from "./layers/input/documentLibrary.js";
import { summarizeCourse } from "./layers/orchestration/courseSummary.js";
import { createPipelineOrchestrator } from "./layers/orchestration/pipelineOrchestrator.js";
import { createProviders } from "./providers/index.js";

async function main(): Promise<void> {
  const [topic, ...documentIds] = process.argv.slice(2);
  if (!topic) {
    console.log('Usage: course-forge "<topic>" [document-id ...]');
    process.exitCode = 1;
    return;
  }

  const runtimeConfig = loadRuntimeConfig();
  const outputDirectory = path.resolve(process.cwd(), runtimeConfig.outputDirectory);
  const documentDirectory = path.resolve(process.cwd(), runtimeConfig.documentDirectory);

  console.log(
    `[bootstrap] course-forge starting in ${runtimeConfig.mode} mode (${runtimeConfig.gatewayModel}) with lesson concurrency ${runtimeConfig.lessonConcurrency}`
  );

  const orchestrator = createPipelineOrchestrator(
    { ...runtimeConfig, outputDirectory },
    createProviders(runtimeConfig),
    new FileDocumentLibrary(documentDirectory)
  );
  const service = new CourseJobService(orchestrator, new JsonFileJobStore(outputDirectory));

  const { jobId } = service.submit({ topic, documentIds });
  process.once("SIGINT", () => {
    console.log(`[bootstrap] cancelling job ${jobId}`);
    service.cancel(jobId);
  });

  const status = await service.waitFor(jobId);
  const result = service.getResult(jobId);

  if (!status || status.status !== "COMPLETED" || !result) {
    console.error(`Job ${jobId} failed: ${status?.errorMessage ?? "unknown error"}`);
    process.exitCode = 1;
    return;
  }

  for (const line of summarizeCourse(result)) {
    console.log(line);
  }
}

main().catch((error: unknown) => {
  if (error instanceof Error) {
    console.error(`Pipeline failed: ${error.message}`);
  } else {
    console.error("Pipeline failed due to an unknown error.");
  }

  process.exitCode = 1;
});
