import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { describeError, exitCodeForError, exitCodeForOutcome } from '../pipeline/errors';
import { createPipeline } from '../pipeline/run';
import { configFromArgs, configOptions, loggerFor } from './options';

async function main() {
    const argv = await yargs(hideBin(process.argv))
        .usage('$0 [options]', 'Fetch the newest recording, transcribe it and write today\'s incident summary')
        .options(configOptions)
        .help()
        .parse();

    const config = configFromArgs(argv);
    const logger = loggerFor(config);
    logger.info('run.config', {
        host: config.host,
        remoteDir: config.remoteDir,
        baseDir: config.baseDir,
        whisperModel: config.whisperModel,
        model: config.model,
        cleanup: config.cleanup,
        log: logger.file,
    });
    try {
        const pipeline = await createPipeline(config, logger);
        const result = await pipeline.run();
        logger.info('run.result', {
            outcome: result.outcome,
            state: result.state,
            recording: result.recordingPath,
            transcript: result.transcript?.textPath,
            summary: result.summaryPath,
        });
        process.exitCode = exitCodeForOutcome(result.outcome);
    } catch (e) {
        logger.critical('run.startup.fail', describeError(e));
        process.exitCode = exitCodeForError(e);
    } finally {
        logger.close();
    }
}

main().catch((e) => {
    console.error(e);
    process.exit(exitCodeForError(e));
});
