import express from 'express';
import cors from 'cors';
import { createServer } from 'http';
import { Server } from 'socket.io';
import { setOptionChainRoutes } from './routes/optionChain';
import { SnapshotStore, SocketSink } from './sinks/socketSink';
import { ChainUpdate } from './sinks/types';
import { Logger, logger as defaultLogger } from './utils/logger';

type ServerToClientEvents = {
    'chain-update': (update: ChainUpdate) => void;
};

export type LiveFeed = {
    sink: SocketSink;
    /** Resolves with the bound port, which differs from the requested one for port 0. */
    listen(): Promise<number>;
    close(): Promise<void>;
};

/**
 * HTTP + socket.io feed of the latest cycle. Clients get the current snapshot
 * on connect and a `chain-update` push after every poll.
 */
export const createLiveFeed = (port: number, logger: Logger = defaultLogger): LiveFeed => {
    const app = express();
    const httpServer = createServer(app);
    const io = new Server<Record<string, never>, ServerToClientEvents>(httpServer, {
        cors: {
            origin: '*',
            methods: ['GET'],
        },
    });
    const store = new SnapshotStore();

    app.use(cors());
    setOptionChainRoutes(app, store);

    io.on('connection', (socket) => {
        logger.debug(`[FEED] Client connected: ${socket.id}`);
        const latest = store.get();
        if (latest) socket.emit('chain-update', latest);

        socket.on('disconnect', () => {
            logger.debug(`[FEED] Client disconnected: ${socket.id}`);
        });
    });

    const sink = new SocketSink(store, {
        broadcast: (update) => {
            io.emit('chain-update', update);
        },
    });

    return {
        sink,
        listen: () =>
            new Promise<number>((resolve, reject) => {
                httpServer.once('error', reject);
                httpServer.listen(port, () => {
                    const address = httpServer.address();
                    const bound = address !== null && typeof address === 'object' ? address.port : port;
                    logger.info(`[FEED] Live option chain on http://localhost:${bound}/option-chain`);
                    resolve(bound);
                });
            }),
        close: () =>
            new Promise<void>((resolve, reject) => {
                io.close((error) => (error ? reject(error) : resolve()));
            }),
    };
};
