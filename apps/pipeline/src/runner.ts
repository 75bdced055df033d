// ──────────────────────────────────────────────
// JobPulse - Pipeline Runner
// Wires config into services and runs one analysis
// ──────────────────────────────────────────────

import { join } from "node:path";
import type {
  CheckpointStore,
  EmbeddingProvider,
  HybridWeights,
  LLMProvider,
  RetryPolicy,
  WorkflowRunResult,
} from "@jobpulse/types";
import { FileCheckpointStore, createWorkflow, executeWorkflow } from "@jobpulse/engine";
import {
  DocumentStore,
  EmbeddingIndexer,
  HashingEmbeddingProvider,
  Retriever,
  loadStoreSnapshot,
  removeStoreSnapshot,
  saveStoreSnapshot,
} from "@jobpulse/retrieval";
import { createLLMProvider, createRemoteEmbeddingProvider } from "@jobpulse/llm";
import { PgCheckpointStore, closeConnection, openDatabase } from "@jobpulse/database";
import { createLogger, sanitizeErrorMessage, type AppConfig } from "@jobpulse/utils";
import { FileJobCache, type JobCache } from "./job-cache.js";
import type { SearchPlan } from "./job-collector.js";
import { writeReports, type WrittenReports } from "./report.js";
import { SerpApiClient, type JobSearchSource } from "./serpapi-client.js";
import type { JobMarketFields } from "./state.js";
import { JOB_MARKET_WORKFLOW, buildJobMarketWorkflow } from "./workflow.js";

const logger = createLogger("pipeline");

export const STORE_SNAPSHOT_FILE = "document_store.json";

export interface PipelineServices {
  llm: LLMProvider;
  source: JobSearchSource;
  cache: JobCache;
  embedding: EmbeddingProvider;
  checkpointStore: CheckpointStore;
  dataDir: string;
  reportsDir: string;
  plan?: SearchPlan;
  requestDelayMs?: number;
  retryPolicy?: Partial<RetryPolicy>;
  maxInvocations?: number;
  weights?: HybridWeights;
  close: () => Promise<void>;
}

export interface PipelineRunOptions {
  forceRestart: boolean;
  signal?: AbortSignal;
}

export interface PipelineRunSummary {
  result: WorkflowRunResult<JobMarketFields>;
  reports: WrittenReports;
  /** The saved checkpoint's last completed stage; absent when nothing was saved. */
  checkpoint: { lastCompletedStage: string | null } | null;
}

function createEmbeddingProvider(config: AppConfig): EmbeddingProvider {
  const { provider, apiKey, model, dimensions } = config.embedding;
  if (provider === "hash") {
    return new HashingEmbeddingProvider(dimensions);
  }
  return createRemoteEmbeddingProvider(provider, {
    apiKey: apiKey ?? config.llm.apiKey,
    dimensions,
    model: model ?? undefined,
  });
}

export function createPipelineServices(config: AppConfig): PipelineServices {
  const databaseUrl = config.databaseUrl;
  const checkpointStore = databaseUrl
    ? new PgCheckpointStore(openDatabase(databaseUrl).db)
    : new FileCheckpointStore(join(config.dataDir, "checkpoints"));

  logger.info(
    {
      llmProvider: config.llm.provider,
      embeddingProvider: config.embedding.provider,
      checkpoints: databaseUrl ? "postgres" : "file",
    },
    "Pipeline services configured"
  );

  return {
    llm: createLLMProvider(config.llm.provider, config.llm.apiKey, config.llm.model ?? undefined),
    source: new SerpApiClient(config.serpapi.apiKey),
    cache: new FileJobCache(config.dataDir),
    embedding: createEmbeddingProvider(config),
    checkpointStore,
    dataDir: config.dataDir,
    reportsDir: config.reportsDir,
    requestDelayMs: config.serpapi.requestDelayMs,
    retryPolicy: {
      maxAttempts: config.engine.maxAttempts,
      baseDelayMs: config.engine.baseDelayMs,
      maxDelayMs: config.engine.maxDelayMs,
    },
    maxInvocations: config.engine.maxInvocations,
    weights: { semantic: config.retrieval.semanticWeight, lexical: config.retrieval.lexicalWeight },
    close: databaseUrl ? closeConnection : async () => {},
  };
}

async function openDocumentStore(
  indexer: EmbeddingIndexer,
  snapshotPath: string,
  forceRestart: boolean
): Promise<DocumentStore> {
  if (forceRestart) {
    await removeStoreSnapshot(snapshotPath);
    return new DocumentStore(indexer);
  }

  try {
    const restored = await loadStoreSnapshot(snapshotPath, indexer);
    return restored?.store ?? new DocumentStore(indexer);
  } catch (err) {
    logger.warn({ snapshotPath, error: sanitizeErrorMessage(err) }, "Document store snapshot unusable, starting empty");
    return new DocumentStore(indexer);
  }
}

async function savedCheckpoint(store: CheckpointStore): Promise<PipelineRunSummary["checkpoint"]> {
  try {
    const record = await store.load(JOB_MARKET_WORKFLOW);
    return record ? { lastCompletedStage: record.lastCompletedStage } : null;
  } catch (err) {
    logger.warn({ error: sanitizeErrorMessage(err) }, "Could not check for a saved checkpoint");
    return null;
  }
}

export async function runJobMarketAnalysis(
  services: PipelineServices,
  options: PipelineRunOptions
): Promise<PipelineRunSummary> {
  const snapshotPath = join(services.dataDir, STORE_SNAPSHOT_FILE);
  const indexer = new EmbeddingIndexer(services.embedding);
  const documentStore = await openDocumentStore(indexer, snapshotPath, options.forceRestart);
  const retriever = new Retriever(documentStore, { weights: services.weights });

  const workflow = createWorkflow(
    buildJobMarketWorkflow({
      llm: services.llm,
      source: services.source,
      cache: services.cache,
      plan: services.plan,
      requestDelayMs: services.requestDelayMs,
    })
  );

  const result = await executeWorkflow({
    workflow,
    forceRestart: options.forceRestart,
    checkpointStore: services.checkpointStore,
    documentStore,
    retriever,
    retryPolicy: services.retryPolicy,
    maxInvocations: services.maxInvocations,
    signal: options.signal,
    onStageComplete: async (step) => {
      logger.info(
        { stage: step.stage, status: step.status, attempts: step.attemptCount, durationMs: step.durationMs },
        "Stage finished"
      );
    },
  });

  await saveStoreSnapshot(documentStore, snapshotPath);
  const reports = await writeReports(result.state, {
    dataDir: services.dataDir,
    reportsDir: services.reportsDir,
  });

  return {
    result,
    reports,
    checkpoint: await savedCheckpoint(services.checkpointStore),
  };
}

export function formatRunSummary(summary: PipelineRunSummary): string[] {
  const { result, reports, checkpoint } = summary;
  const lines: string[] = [];

  if (result.terminal === "END") {
    lines.push(`Workflow completed in ${result.invocationCount} stage invocation(s).`);
    const statistics = result.state.fields.finalReport?.statistics;
    if (statistics) {
      lines.push(`Total jobs analysed: ${statistics.totalJobs}`);
      lines.push(`AI-specific roles: ${statistics.aiRoles} (${statistics.aiRolePercentage}%)`);
      lines.push(`Remote positions: ${statistics.remotePercentage}%`);
    }
    if (reports.reportPath) {
      lines.push(`Report written to ${reports.reportPath}`);
    }
    return lines;
  }

  lines.push(`Workflow failed at stage "${result.failedStage ?? "unknown"}" (${result.errorCode ?? "UNKNOWN"}).`);
  lines.push(`Reason: ${result.state.error ?? result.errorMessage ?? "unknown"}`);
  if (checkpoint?.lastCompletedStage) {
    lines.push(`A checkpoint was saved; rerun to resume after stage "${checkpoint.lastCompletedStage}".`);
  } else if (checkpoint) {
    lines.push("A checkpoint was saved before any stage completed; the next run starts from the first stage.");
  } else {
    lines.push("No checkpoint is available; the next run starts from the beginning.");
  }
  return lines;
}
