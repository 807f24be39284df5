import {VBoxClient} from '../src';

type CliOptions = {
    host?: string;
    port?: number;
    version?: string;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {};
    for (const arg of argv) {
        if (arg.startsWith('--host=')) {
            options.host = arg.substring('--host='.length);
        } else if (arg.startsWith('--port=')) {
            const port = Number(arg.substring('--port='.length));
            if (Number.isInteger(port) && port > 0 && port <= 65535) options.port = port;
        } else if (arg.startsWith('--version=')) {
            options.version = arg.substring('--version='.length);
        }
    }
    return options;
}

const client = VBoxClient.create(parseArgs(process.argv.slice(2)));

async function main(): Promise<void> {
    await client.connect();

    const rooms = await client.getRoomCount();
    console.log(`Rooms: ${rooms.count}`);
    for (const roomId of rooms.roomIds) {
        const room = await client.getRoomMetaData(roomId);
        console.log(`  room ${room.roomId}: ${room.name}`);
    }

    const nodes = await client.getNodeCount();
    console.log(`Nodes: ${nodes.count}`);
    for (const nodeId of nodes.nodeIds) {
        const node = await client.getNodeMetaData(nodeId);
        if (node.kind === 'NodeMetaData') {
            console.log(`  node ${node.nodeId}: ${node.totalKeys} keys, room ${node.roomId}, firmware ${node.version}`);
        } else {
            console.log(`  node ${nodeId}: ${node.payload.length} bytes of metadata`);
        }
    }
}

main()
    .catch((err) => {
        console.error('[VBoxError]', err instanceof Error ? err.message : err);
        process.exitCode = 1;
    })
    .finally(() => client.disconnect());
