import { STATUS_CODES, type IncomingMessage, type Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { logThought } from '../utils/logger.js';
import { getConfigValue } from '../config/json-config.js';
import { checkSignature } from './shared.js';
import type { BackupEvent } from '../types/backup.js';
import type { HealthData } from '../types/api.js';
import {
    WS_EVENT_TOPICS,
    isWsEventTopic,
    type WsEventEnvelope,
    type WsEventTopic,
    type WsHubMetrics,
    type WsOutboundMessage,
    type WsSnapshotFields,
    type WsSubscription,
} from '../types/websocket.js';

export const WS_PATH = '/ws';

/** Builds the state a client receives right after it subscribes. */
export type SnapshotProvider = (subscription: WsSubscription) => WsSnapshotFields;

export interface WsHubConfig {
    /** Secret the upgrade request is signed with; defaults to the configured apiSecret. */
    resolveSecret?: () => string;
}

interface HubClient {
    ws: WebSocket;
    subscription: WsSubscription | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rejectUpgrade(socket: Duplex, status: number): void {
    socket.once('finish', () => socket.destroy());
    socket.end(`HTTP/1.1 ${status} ${STATUS_CODES[status] ?? 'Error'}\r\nConnection: close\r\n\r\n`);
}

/** A subscription, or the reason the message was refused. */
function parseSubscription(raw: string): WsSubscription | string {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return 'Invalid JSON.';
    }
    if (!isRecord(parsed) || typeof parsed.type !== 'string') {
        return 'Malformed message: missing "type" field.';
    }
    if (parsed.type !== 'subscribe') {
        return `Unknown message type: ${parsed.type}`;
    }

    const rawTopics: unknown[] = Array.isArray(parsed.topics) ? parsed.topics : [];
    const invalid = rawTopics.filter((topic) => !isWsEventTopic(topic)).map(String);
    if (rawTopics.length === 0 || invalid.length > 0) {
        return `Invalid topics: ${invalid.join(', ') || 'none given'}. Valid topics: ${WS_EVENT_TOPICS.join(', ')}.`;
    }
    const topics = WS_EVENT_TOPICS.filter((topic) => rawTopics.includes(topic));

    if (parsed.entities === undefined) {
        return { topics, entities: null };
    }
    const { entities } = parsed;
    if (!Array.isArray(entities) || !entities.every((id): id is string => typeof id === 'string' && id.length > 0)) {
        return "Field 'entities' must be a list of entity ids.";
    }
    return { topics, entities: [...new Set(entities)] };
}

function follows(subscription: WsSubscription | null, topic: WsEventTopic, entityId?: string): boolean {
    if (!subscription || !subscription.topics.includes(topic)) return false;
    if (entityId === undefined || subscription.entities === null) return true;
    return subscription.entities.includes(entityId);
}

/**
 * Streams backup events and health summaries at `/ws`.
 *
 * The upgrade request carries the same `X-Signature` as a signed GET (an
 * HMAC of the empty body). A client then sends `subscribe` with the topics it
 * wants and, optionally, the entity ids it follows; each subscribe replaces
 * the previous one and is answered with the current state.
 */
export class WsHub {
    readonly #resolveSecret: () => string;
    readonly #wss = new WebSocketServer({ noServer: true });
    readonly #clients = new Set<HubClient>();
    #server: Server | null = null;
    #snapshotProvider: SnapshotProvider | null = null;
    #seq = 0;
    #rejectedUpgrades = 0;
    #lastEventAt: string | null = null;

    constructor(config: WsHubConfig = {}) {
        this.#resolveSecret = config.resolveSecret ?? (() => getConfigValue('API_SECRET') ?? '');
    }

    /** Take over upgrade requests of `server`; attach before it starts listening. */
    attach(server: Server): void {
        this.#server = server;
        server.on('upgrade', this.#handleUpgrade);
        void logThought(`[WsHub] Event stream attached on ${WS_PATH}.`);
    }

    stop(): void {
        this.#server?.off('upgrade', this.#handleUpgrade);
        this.#server = null;
        for (const client of this.#clients) {
            client.ws.close(1001, 'Server shutting down.');
        }
        this.#clients.clear();
        this.#wss.close();
        void logThought('[WsHub] Event stream stopped.');
    }

    setSnapshotProvider(provider: SnapshotProvider | null): void {
        this.#snapshotProvider = provider;
    }

    /** Deliver to clients following the `backup` topic and the event's entity. */
    publishBackupEvent(event: BackupEvent): void {
        this.#broadcast(
            { type: 'event', v: 1, topic: 'backup', seq: ++this.#seq, ts: new Date().toISOString(), payload: event },
            event.entityId,
        );
    }

    publishHealth(data: HealthData): void {
        this.#broadcast({
            type: 'event',
            v: 1,
            topic: 'health',
            seq: ++this.#seq,
            ts: new Date().toISOString(),
            payload: data,
        });
    }

    getMetrics(): WsHubMetrics {
        let subscribed = 0;
        for (const client of this.#clients) {
            if (client.subscription) subscribed++;
        }
        return {
            connectedClients: this.#clients.size,
            subscribedClients: subscribed,
            rejectedUpgrades: this.#rejectedUpgrades,
            lastEventAt: this.#lastEventAt,
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    readonly #handleUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
        const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
        if (pathname !== WS_PATH) {
            rejectUpgrade(socket, 404);
            return;
        }
        const check = checkSignature(req.headers['x-signature'], [''], this.#resolveSecret());
        if (!check.ok) {
            this.#rejectedUpgrades++;
            void logThought(`[WsHub] Upgrade rejected: ${check.message}`);
            rejectUpgrade(socket, check.status);
            return;
        }
        this.#wss.handleUpgrade(req, socket, head, (ws) => {
            this.#handleConnection(ws);
        });
    };

    #handleConnection(ws: WebSocket): void {
        const client: HubClient = { ws, subscription: null };
        this.#clients.add(client);

        ws.on('message', (data: RawData) => {
            this.#handleMessage(client, data.toString());
        });
        ws.on('close', () => {
            this.#clients.delete(client);
        });
        ws.on('error', (err: Error) => {
            void logThought(`[WsHub] Client socket error: ${err.message}`);
            this.#clients.delete(client);
        });
    }

    #handleMessage(client: HubClient, raw: string): void {
        const subscription = parseSubscription(raw);
        if (typeof subscription === 'string') {
            this.#send(client, { type: 'error', message: subscription, ts: new Date().toISOString() });
            return;
        }

        client.subscription = subscription;
        this.#send(client, { type: 'subscribed', ...subscription, ts: new Date().toISOString() });
        if (this.#snapshotProvider) {
            const snapshot = this.#snapshotProvider(subscription);
            this.#send(client, { type: 'snapshot', v: 1, ts: new Date().toISOString(), ...snapshot });
        }
    }

    #broadcast(envelope: WsEventEnvelope, entityId?: string): void {
        this.#lastEventAt = envelope.ts;
        const frame = JSON.stringify(envelope);
        for (const client of this.#clients) {
            if (follows(client.subscription, envelope.topic, entityId) && client.ws.readyState === WebSocket.OPEN) {
                client.ws.send(frame);
            }
        }
    }

    #send(client: HubClient, message: WsOutboundMessage): void {
        if (client.ws.readyState === WebSocket.OPEN) {
            client.ws.send(JSON.stringify(message));
        }
    }
}
