import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import fs from "fs-extra";
import { EXIT_CODES, exitCodeForError } from "../pipeline/errors";
import { createSummarizer } from "../pipeline/run";
import { ArtifactStore } from "../pipeline/store";
import { configFromArgs, configOptions, loggerFor } from "./options";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("transcript", { type: "string", demandOption: true, describe: "Rendered transcript (.txt)" })
    .options(configOptions)
    .parse();

  const config = configFromArgs(argv);
  const logger = loggerFor(config);
  const store = new ArtifactStore(config.baseDir, logger);
  await store.init();

  const text = await fs.readFile(argv.transcript, "utf8");
  const summary = await createSummarizer(config, logger).summarize(text);
  if (!summary) {
    logger.close();
    console.error("Summary generation failed; see log for details.");
    process.exitCode = EXIT_CODES.summaryFailed;
    return;
  }
  const outPath = await store.writeSummary(summary, new Date());
  logger.close();
  console.log("Summary:", outPath);
}

main().catch((e) => {
  console.error(e);
  process.exit(exitCodeForError(e));
});
