import {KeyPowerStatus, VBoxClient} from '../src';

type CliOptions = {
    host?: string;
    port?: number;
    username?: string;
    password?: string;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {};
    for (const arg of argv) {
        if (arg.startsWith('--host=')) {
            options.host = arg.substring('--host='.length);
        } else if (arg.startsWith('--port=')) {
            const port = Number(arg.substring('--port='.length));
            if (Number.isInteger(port) && port > 0 && port <= 65535) options.port = port;
        } else if (arg.startsWith('--user=')) {
            options.username = arg.substring('--user='.length);
        } else if (arg.startsWith('--password=')) {
            options.password = arg.substring('--password='.length);
        }
    }
    return options;
}

const client = VBoxClient.create(parseArgs(process.argv.slice(2)));
const {connection} = client;

connection.on('connect', () => {
    console.log(`Connected to vBox ${connection.host}:${connection.port}`);
});

connection.on('state', (state) => {
    console.log(`Connection state: ${state}`);
});

connection.on('reconnecting', (attempt, delayMs) => {
    console.log(`Reconnect attempt ${attempt} in ${delayMs}ms`);
});

connection.on('error', (error) => {
    console.error('[VBoxError]', error.message);
});

client.onKeyStatus((status) => {
    const power = KeyPowerStatus[status.power] ?? `0x${status.power.toString(16)}`;
    console.log(`Key ${status.nodeId}/${status.keyId}: ${power}`);
});

async function main(): Promise<void> {
    await client.connect();
    console.log('Listening for key presses (Ctrl+C to stop)');
}

main().catch((err) => {
    console.error('[ConnectError]', err instanceof Error ? err.message : err);
    process.exitCode = 1;
});

function shutdown(): void {
    client.disconnect();
    process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
