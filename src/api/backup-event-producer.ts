import { logThought } from '../utils/logger.js';
import type { WsHub } from './websocket-hub.js';
import { WS_EVENT_TOPICS, type WsSnapshotFields, type WsSubscription } from '../types/websocket.js';
import type { WatchManager } from '../services/watch-manager.js';
import { buildHealthData, type HealthDeps } from './handlers/health.js';

const DEFAULT_PUBLISH_INTERVAL_MS = 5_000;

export interface BackupEventProducerDeps extends HealthDeps {
    hub: WsHub;
    manager: WatchManager;
}

export interface BackupEventProducerConfig {
    /** Interval of the periodic `health` publication. */
    publishIntervalMs?: number;
}

/**
 * Forwards every {@link WatchManager} backup event to the `backup` topic and
 * publishes a health summary on `health` at a fixed interval. Newly subscribed
 * clients get the current state of the entities they follow.
 */
export class BackupEventProducer {
    readonly #hub: WsHub;
    readonly #deps: HealthDeps;
    readonly #intervalMs: number;
    #timer: ReturnType<typeof setInterval> | null = null;
    #unsubscribe: (() => void) | null = null;

    constructor(deps: BackupEventProducerDeps, config: BackupEventProducerConfig = {}) {
        const { hub, ...rest } = deps;
        this.#hub = hub;
        this.#deps = rest;
        this.#intervalMs = config.publishIntervalMs ?? DEFAULT_PUBLISH_INTERVAL_MS;
    }

    start(): void {
        if (this.#timer) return;
        this.#hub.setSnapshotProvider((subscription) => this.collectSnapshot(subscription));
        this.#unsubscribe = this.#deps.manager.onEvent((event) => {
            this.#hub.publishBackupEvent(event);
        });
        this.#timer = setInterval(() => {
            this.#hub.publishHealth(buildHealthData(this.#deps));
        }, this.#intervalMs);
        void logThought('[BackupEventProducer] Started event publishing.');
    }

    stop(): void {
        if (this.#timer) {
            clearInterval(this.#timer);
            this.#timer = null;
        }
        this.#unsubscribe?.();
        this.#unsubscribe = null;
        this.#hub.setSnapshotProvider(null);
        void logThought('[BackupEventProducer] Stopped.');
    }

    /** Current state of the subscribed topics, narrowed to the followed entities. */
    collectSnapshot(subscription: WsSubscription = { topics: [...WS_EVENT_TOPICS], entities: null }): WsSnapshotFields {
        const { topics, entities } = subscription;
        const snapshot: WsSnapshotFields = {};

        if (topics.includes('backup')) {
            const statuses = this.#deps.manager.listStatuses();
            snapshot.backup = {
                entities: entities === null ? statuses : statuses.filter((status) => entities.includes(status.entityId)),
            };
        }
        if (topics.includes('health')) {
            snapshot.health = buildHealthData(this.#deps);
        }
        return snapshot;
    }
}
