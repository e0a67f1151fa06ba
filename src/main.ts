// Audio Violence Analyzer - Entry point
// Wires up the inference collaborators and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { loadConfigFromEnv } from "./config.js";
import { EnergyVAD } from "./energy-vad.js";
import { errorMessage } from "./errors.js";
import { FeatureExtractor } from "./feature-extractor.js";
import { APP_NAME, APP_VERSION } from "./index.js";
import type { Transcriber, VoiceActivityDetector } from "./inference.js";
import { ModelServerClient } from "./model-server-client.js";
import { ReportPersistence } from "./report-persistence.js";
import { createAppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { OpenAIModerationScorer, type OpenAIModerationClient } from "./toxicity-scorer.js";
import {
  DeepgramTranscriber,
  OpenAITranscriber,
  type DeepgramPrerecordedClient,
  type OpenAITranscriptionClient,
} from "./transcriber.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

const port = parseInt(process.env.PORT || "3000", 10);
const transcriberBackend = (process.env.TRANSCRIBER || "openai").toLowerCase();
const vadBackend = (process.env.VAD_BACKEND || "energy").toLowerCase();
const outputDir = process.env.OUTPUT_DIR || "output";

// ─── Validate configuration ─────────────────────────────────────────────────────

let config: ReturnType<typeof loadConfigFromEnv>;
try {
  config = loadConfigFromEnv(process.env);
} catch (err) {
  logFatal(errorMessage(err));
  process.exit(1);
}

if (transcriberBackend !== "openai" && transcriberBackend !== "deepgram") {
  logFatal(`TRANSCRIBER must be "openai" or "deepgram" (got "${transcriberBackend}").`);
  process.exit(1);
}

if (vadBackend !== "energy" && vadBackend !== "model-server") {
  logFatal(`VAD_BACKEND must be "energy" or "model-server" (got "${vadBackend}").`);
  process.exit(1);
}

// ─── Validate API keys ─────────────────────────────────────────────────────────

const openaiKey = process.env.OPENAI_API_KEY;
const deepgramKey = process.env.DEEPGRAM_API_KEY;
const modelServerUrl = process.env.MODEL_SERVER_URL;

if (!openaiKey) {
  logFatal("OPENAI_API_KEY is not set. Add it to your .env file.");
  process.exit(1);
}

if (transcriberBackend === "deepgram" && !deepgramKey) {
  logFatal("DEEPGRAM_API_KEY is not set but TRANSCRIBER=deepgram. Add it to your .env file.");
  process.exit(1);
}

if (!modelServerUrl) {
  logFatal("MODEL_SERVER_URL is not set. The acoustic and emotion classifiers run behind it.");
  process.exit(1);
}

logInit("API keys loaded");

// ─── Initialize API clients ─────────────────────────────────────────────────────

logInit("Creating OpenAI client...");
const openaiClient = new OpenAI({ apiKey: openaiKey });

logInit(`Creating model server client (${modelServerUrl})...`);
const modelServer = new ModelServerClient({ baseUrl: modelServerUrl });

// ─── Initialize inference collaborators ─────────────────────────────────────────

let transcriber: Transcriber;
if (transcriberBackend === "deepgram" && deepgramKey) {
  logInit("Initializing DeepgramTranscriber (pre-recorded)...");
  transcriber = new DeepgramTranscriber(createDeepgramClient(deepgramKey) as unknown as DeepgramPrerecordedClient);
} else {
  logInit("Initializing OpenAITranscriber (whisper-1)...");
  transcriber = new OpenAITranscriber(openaiClient as unknown as OpenAITranscriptionClient);
}

let vad: VoiceActivityDetector;
if (vadBackend === "model-server") {
  logInit("Using model server VAD");
  vad = modelServer.asVoiceActivityDetector();
} else {
  logInit("Using energy VAD");
  vad = new EnergyVAD();
}

const extractor = new FeatureExtractor({
  collaborators: {
    vad,
    acoustic: modelServer,
    transcriber,
    toxicity: new OpenAIModerationScorer(openaiClient as unknown as OpenAIModerationClient),
    emotion: modelServer.asEmotionClassifier(),
  },
  config,
});

// ─── Create SessionManager ──────────────────────────────────────────────────────

logInit(`Initializing ReportPersistence (${outputDir}/)...`);
const sessionManager = new SessionManager({
  extractor,
  config,
  reportPersistence: new ReportPersistence(outputDir),
});
sessionManager.startSweep();

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({ sessionManager });

const shutdown = (signal: string) => {
  logInit(`${signal} received, shutting down`);
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      logFatal(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    },
  );
};
process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

server
  .listen(port)
  .then(async () => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
    logInit(
      `Weights: acoustic ${config.fusion.acoustic}, nlp ${config.fusion.nlp}, emotion ${config.fusion.emotion}; ` +
        `chunks ${config.chunking.chunkDurationSeconds}s every ${config.chunking.strideSeconds}s`,
    );
    if (!(await modelServer.healthCheck())) {
      console.warn(`[WARN] [${ts()}] Model server at ${modelServerUrl} is not reachable; acoustic and emotion scores will be absent`);
    }
    logInit("Ready for connections");
  })
  .catch((err: unknown) => {
    logFatal(`Failed to start server: ${errorMessage(err)}`);
    process.exit(1);
  });
