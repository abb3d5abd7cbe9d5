import crypto from 'crypto';
import { AuditRepository } from '../audit/auditRepository.js';
import { AuditWriter } from '../audit/auditWriter.js';
import { E2BSandboxClient } from '../backends/e2bSandboxClient.js';
import { GraphBackend } from '../backends/graphBackend.js';
import { Neo4jGraphClient } from '../backends/neo4jGraphClient.js';
import { SandboxBackend } from '../backends/sandboxBackend.js';
import { BackpressureController } from '../backpressure/controller.js';
import { LoadPublisher } from '../backpressure/loadPublisher.js';
import { LoadSnapshot } from '../backpressure/loadSnapshot.js';
import { ArtifactCache } from '../cache/artifactCache.js';
import { buildCacheNamespaces } from '../cache/namespaces.js';
import { RedisKeyValueStore } from '../cache/redisKeyValueStore.js';
import { createDatabase, Database } from '../db/index.js';
import { ExecutionDispatcher } from '../execution/dispatcher.js';
import { retryPolicyFrom } from '../execution/retryPolicy.js';
import { HealthVerifier } from '../health/healthVerifier.js';
import { logger } from '../logging/logger.js';
import { configureTracing } from '../observability/tracing.js';
import { Orchestrator } from '../orchestrator/orchestrator.js';
import { RequestRegistry } from '../orchestrator/requestRegistry.js';
import type { Settings } from './settings.js';

/**
 * Everything a running instance owns. Shutdown closes these in reverse
 * order of construction.
 */
export interface ServiceContainer {
    readonly instanceId: string;
    readonly settings: Settings;
    readonly orchestrator: Orchestrator;
    readonly controller: BackpressureController;
    readonly health: HealthVerifier;
    readonly auditWriter: AuditWriter;
    readonly publisher: LoadPublisher;
    readonly stores: { readonly general: RedisKeyValueStore; readonly dedicated: RedisKeyValueStore };
    readonly graph: Neo4jGraphClient;
    readonly sandbox: E2BSandboxClient;
    readonly database: Database;
}

export async function bootstrap(serviceName: string, settings: Settings): Promise<ServiceContainer> {
    const instanceId = `${serviceName}:${crypto.randomUUID()}`;
    logger.info({ serviceName, instanceId, env: settings.env }, 'Bootstrapping service');

    await configureTracing(settings.tracing);

    const stores = {
        general: new RedisKeyValueStore('general', settings.cache.general),
        dedicated: new RedisKeyValueStore('dedicated', settings.cache.dedicated)
    };
    await Promise.all([stores.general.connect(), stores.dedicated.connect()]);
    const namespaces = buildCacheNamespaces(settings.cache, stores);
    const cache = new ArtifactCache(namespaces);

    const database = createDatabase(settings.database);
    const auditWriter = new AuditWriter(new AuditRepository(database));

    const graph = new Neo4jGraphClient(settings.graph);
    const sandbox = new E2BSandboxClient(settings.sandbox);
    if (!settings.sandbox.apiKey) {
        logger.warn('E2B_API_KEY not set; sandbox tasks will fail as BackendUnavailable');
    }

    const dispatcher = new ExecutionDispatcher({
        backends: [new SandboxBackend(sandbox, settings.sandbox.templateId), new GraphBackend(graph)],
        retryPolicy: retryPolicyFrom(settings.dispatch),
        lineage: auditWriter
    });

    const controller = new BackpressureController(
        settings.backpressure,
        new LoadSnapshot(settings.backpressure.errorWindow)
    );
    const publisher = new LoadPublisher(namespaces.backpressure.store, { instanceId });
    controller.onChange(view => publisher.publish(view));

    const orchestrator = new Orchestrator({
        controller,
        cache,
        dispatcher,
        audit: auditWriter,
        registry: new RequestRegistry(settings.registry),
        dispatch: settings.dispatch
    });

    const health = new HealthVerifier([
        { name: 'graph', required: true, probe: () => graph.ping() },
        { name: 'database', required: true, probe: () => database.probe() },
        { name: 'cache:general', required: true, probe: () => stores.general.ping() },
        { name: 'cache:dedicated', required: true, probe: () => stores.dedicated.ping() },
        { name: 'sandbox', required: false, probe: () => sandbox.ping() }
    ], () => controller.isDegraded);

    logger.info({ serviceName, capacity: settings.backpressure.capacity }, 'Startup checks passed');

    return {
        instanceId,
        settings,
        orchestrator,
        controller,
        health,
        auditWriter,
        publisher,
        stores,
        graph,
        sandbox,
        database
    };
}
