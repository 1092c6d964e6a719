'use strict';

import { createServer, type Server } from 'node:http';

import { loadServerConfig } from './config';
import type { ServerConfig } from './config';
import { ValidationError } from './errors';
import { normalizeWebhook, SUPPORTED_WEBHOOK_EVENTS } from './events';
import type { NormalizedWebhook } from './events';
import { createGithubCapability, createRestCompatClient } from './github';
import { createChildLogger, createLogger } from './logger';
import type { Logger } from './logger';
import { createPipeline } from './pipeline';
import { getDefaultTaxonomy, loadTaxonomy } from './taxonomy';
import type { EnvMap } from './types';

export const WEBHOOK_PATH = '/api/github/webhooks';

interface WebhookDelivery {
    id: string;
    name: string;
    payload: unknown;
}

export async function createGithubApp({
    config,
    logger,
}: {
    config: ServerConfig;
    logger: Logger;
}): Promise<{
    app: import('@octokit/app').App;
    createNodeMiddleware: typeof import('@octokit/webhooks').createNodeMiddleware;
}> {
    const [{ App }, { createNodeMiddleware }] = await Promise.all([
        import('@octokit/app'),
        import('@octokit/webhooks'),
    ]);

    const taxonomy = config.pipeline.taxonomyPath
        ? loadTaxonomy(config.pipeline.taxonomyPath)
        : getDefaultTaxonomy();

    const app = new App({
        appId: config.appId,
        privateKey: config.privateKey,
        webhooks: {
            secret: config.webhookSecret,
        },
    });

    const handleDelivery = async ({ id, name, payload }: WebhookDelivery): Promise<void> => {
        const log = createChildLogger(logger, { deliveryId: id, webhook: name });

        let normalized: NormalizedWebhook;
        try {
            normalized = normalizeWebhook(name, id, payload);
        } catch (error) {
            if (error instanceof ValidationError) {
                log.warn({ issues: error.issues }, 'Skipping malformed webhook payload');
                return;
            }

            throw error;
        }

        if (normalized.status === 'ignored') {
            log.debug({ reason: normalized.reason }, 'Webhook ignored');
            return;
        }

        const { event, installationId } = normalized;
        if (!installationId) {
            log.error('Missing installation id; skipping delivery.');
            return;
        }

        const octokit = await app.getInstallationOctokit(installationId);
        const capability = createGithubCapability(createRestCompatClient(octokit), {
            taxonomy,
            timeoutMs: config.pipeline.requestTimeoutMs,
        });

        await createPipeline({
            capability,
            config: config.pipeline,
            taxonomy,
            logger,
        }).handle(event);
    };

    for (const name of SUPPORTED_WEBHOOK_EVENTS) {
        app.webhooks.on(name, async ({ id, payload }: { id: string; payload: unknown }) => {
            await handleDelivery({ id, name, payload });
        });
    }

    app.webhooks.onError((error: unknown) => {
        logger.error({ err: error }, 'Webhook processing failed.');
    });

    return { app, createNodeMiddleware };
}

export async function startServer({
    env = process.env,
    logger,
}: {
    env?: EnvMap;
    logger?: Logger;
} = {}): Promise<Server> {
    const config = loadServerConfig(env);
    const log = logger ?? createLogger(config.pipeline.logLevel);
    const { app, createNodeMiddleware } = await createGithubApp({
        config,
        logger: log,
    });
    const webhookMiddleware = createNodeMiddleware(app.webhooks, {
        path: WEBHOOK_PATH,
    });

    const server = createServer((req, res) => {
        void webhookMiddleware(req, res, () => {
            res.writeHead(404, { 'Content-Type': 'text/plain' });
            res.end('Not Found');
        });
    });

    await new Promise<void>((resolve, reject) => {
        server.listen(config.port, () => {
            log.info({ port: config.port }, 'GitHub App webhook server listening.');
            resolve();
        });
        server.on('error', reject);
    });

    return server;
}

if (require.main === module) {
    startServer().catch((error: unknown) => {
        createLogger().fatal({ err: error }, 'Failed to start server.');
        process.exitCode = 1;
    });
}
