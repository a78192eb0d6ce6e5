import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { assertRemoteConfig } from '../pipeline/config';
import { exitCodeForError } from '../pipeline/errors';
import { RemoteFileSource, type RemoteSession } from '../pipeline/remote';
import { ArtifactStore } from '../pipeline/store';
import { configFromArgs, configOptions, loggerFor } from './options';

async function main() {
    const argv = await yargs(hideBin(process.argv))
        .options(configOptions)
        .help()
        .parse();

    const config = configFromArgs(argv);
    assertRemoteConfig(config);
    const logger = loggerFor(config);
    const store = new ArtifactStore(config.baseDir, logger);
    await store.init();

    const source = new RemoteFileSource({
        logger,
        extensions: config.extensions,
        cleanup: config.cleanup,
        archiveDirName: config.archiveDirName,
        port: config.port,
        connectTimeoutMs: config.connectTimeoutSec * 1000,
    });
    let session: RemoteSession | null = null;
    try {
        session = await source.connect(config.host, config.username, config.keyPath);
        const localPath = await source.fetchNewest(session, config.remoteDir, store.recordingsDir);
        if (localPath) {
            await source.archive(session, config.remoteDir);
            console.log('Recording:', localPath);
        } else {
            console.log('No recording downloaded.');
        }
    } finally {
        if (session) await source.close(session);
        logger.close();
    }
}

main().catch((e) => {
    console.error(e);
    process.exit(exitCodeForError(e));
});
