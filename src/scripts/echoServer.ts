import { CONFIG } from '../config/config';
import { ConfigStore } from '../infrastructure/database/ConfigStore';
import { SecureChannel } from '../core/network/SecureChannel';
import { Logger } from '../core/logging/Logger';

/**
 * Usage: echoServer [serviceName] [version]
 * Serves every admitted connection with the echo loop until SIGINT.
 */
async function runEchoServer(): Promise<void> {
    const [serviceName = 'server', version = CONFIG.NETWORK.DEFAULT_VERSION] = process.argv.slice(2);

    const store = new ConfigStore(CONFIG.PATHS.CONFIG_DB);
    const channel = await SecureChannel.fromConfig(store, serviceName, version);
    store.close();

    const listener = await channel.endpoint.listen(socket => channel.serve(socket));
    Logger.info('EchoServer', `${CONFIG.SERVER.NAME} ${CONFIG.SERVER.VERSION} serving ${serviceName}:${version} on ${listener.address.host}:${listener.address.port}`);

    process.once('SIGINT', () => {
        Logger.info('EchoServer', 'Stopped by user');
        listener.close();
    });
}

runEchoServer().catch((err: unknown) => {
    Logger.error('EchoServer', 'Server failed', err);
    process.exitCode = 1;
});
