import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import path from "path";
import { EXIT_CODES, exitCodeForError } from "../pipeline/errors";
import { ArtifactStore } from "../pipeline/store";
import { TranscriptionEngine, WhisperCliBackend } from "../pipeline/transcribe";
import { configFromArgs, configOptions, loggerFor } from "./options";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("audio", { type: "string", demandOption: true, describe: "Local recording to transcribe" })
    .options(configOptions)
    .parse();

  const config = configFromArgs(argv);
  const logger = loggerFor(config);
  const store = new ArtifactStore(config.baseDir, logger);
  await store.init();
  const engine = new TranscriptionEngine({
    backend: new WhisperCliBackend({
      bin: config.whisperBin,
      model: config.whisperModel,
      logger,
      timeoutMs: config.transcribeTimeoutSec * 1000,
    }),
    store,
    logger,
  });
  await engine.ensureAvailable();

  const transcript = await engine.transcribe(path.resolve(argv.audio), config.language);
  logger.close();
  if (!transcript) {
    console.error("Transcription failed; see log for details.");
    process.exitCode = EXIT_CODES.transcriptionFailed;
    return;
  }
  console.log("Transcript:");
  console.log(" - text:", transcript.textPath);
  console.log(" - json:", transcript.jsonPath);
}

main().catch((e) => {
  console.error(e);
  process.exit(exitCodeForError(e));
});
