import type { BackupEvent, EntityStatusSnapshot } from './backup.js';
import type { HealthData } from './api.js';

/** Subscribable event topics. */
export type WsEventTopic = 'backup' | 'health';

export const WS_EVENT_TOPICS: readonly WsEventTopic[] = ['backup', 'health'];

export function isWsEventTopic(value: unknown): value is WsEventTopic {
    return value === 'backup' || value === 'health';
}

/**
 * What one client listens to. `entities: null` follows every entity; a list
 * narrows `backup` events and the `backup` snapshot to those ids.
 */
export interface WsSubscription {
    topics: WsEventTopic[];
    entities: string[] | null;
}

// ── Inbound Messages (client → server) ────────────────────────────────────────

/** Replaces the client's subscription. */
export interface WsSubscribeMessage {
    type: 'subscribe';
    topics: WsEventTopic[];
    entities?: string[];
}

// ── Outbound Messages (server → client) ────────────────────────────────────────

export interface WsSubscribedMessage extends WsSubscription {
    type: 'subscribed';
    ts: string;
}

export interface WsErrorMessage {
    type: 'error';
    message: string;
    ts: string;
}

interface WsEnvelopeBase {
    type: 'event';
    v: 1;
    seq: number;
    ts: string;
}

export interface WsBackupEnvelope extends WsEnvelopeBase {
    topic: 'backup';
    payload: BackupEvent;
}

export interface WsHealthEnvelope extends WsEnvelopeBase {
    topic: 'health';
    payload: HealthData;
}

/** `seq` increases per hub across both topics. */
export type WsEventEnvelope = WsBackupEnvelope | WsHealthEnvelope;

/** State sent right after a subscription; only the subscribed topics are populated. */
export interface WsSnapshotFields {
    backup?: { entities: EntityStatusSnapshot[] };
    health?: HealthData;
}

export interface WsSnapshotMessage extends WsSnapshotFields {
    type: 'snapshot';
    v: 1;
    ts: string;
}

export type WsOutboundMessage = WsSubscribedMessage | WsErrorMessage | WsEventEnvelope | WsSnapshotMessage;

// ── Hub Diagnostics ────────────────────────────────────────────────────────────

export interface WsHubMetrics {
    connectedClients: number;
    subscribedClients: number;
    rejectedUpgrades: number;
    lastEventAt: string | null;
}
