import { describe, it, expect, afterEach, vi } from 'vitest';
import { createDocumentStore, createDocumentStoreFromEnv } from '../factory.js';
import { DocumentStore } from '../document-store.js';
import { ConfigurationError } from '../backend/types.js';
import { Secret } from '../secret.js';
import { createLogger } from '../../logger/index.js';

const logger = createLogger({ silent: true });

describe('Document store factory', () => {
	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it('should create an in-memory store', async () => {
		const store = await createDocumentStore({ type: 'in-memory', embeddingDimension: 4 }, { logger });

		expect(store).toBeInstanceOf(DocumentStore);
		expect(store.getInfo()).toMatchObject({ backend: 'in-memory', connected: false, embeddingDimension: 4 });
	});

	it('should create a pgvector store without connecting', async () => {
		const store = await createDocumentStore(
			{ type: 'pgvector', connectionString: Secret.fromToken('postgres://localhost/test') },
			{ logger }
		);

		expect(store.getInfo()).toMatchObject({ backend: 'pgvector', connected: false });
	});

	it('should keep working when an unrelated environment variable is invalid', async () => {
		vi.stubEnv('DOCSTORE_EMBEDDING_DIMENSION', 'abc');
		const store = await createDocumentStore({ type: 'in-memory', embeddingDimension: 3, logLevel: 'error' });

		await expect(store.write([{ id: 'a', content: 'x' }])).resolves.toBe(1);
		await expect(store.count()).resolves.toBe(1);
	});

	it('should reject invalid configurations', async () => {
		await expect(
			createDocumentStore({ type: 'in-memory', embeddingDimension: -1 }, { logger })
		).rejects.toBeInstanceOf(ConfigurationError);
	});

	it('should fail at creation when Azure credentials are missing', async () => {
		await expect(
			createDocumentStore(
				{
					type: 'azure-ai-search',
					endpoint: Secret.fromEnvVar('DOCSTORE_TEST_UNSET_ENDPOINT', false),
					apiKey: Secret.fromToken('test-secret'),
				},
				{ logger }
			)
		).rejects.toThrow('Missing Azure AI Search endpoint');
	});

	it('should read the backend and collection from the environment', async () => {
		vi.stubEnv('DOCSTORE_BACKEND', 'in-memory');
		vi.stubEnv('DOCSTORE_COLLECTION', 'notes');
		vi.stubEnv('DOCSTORE_EMBEDDING_DIMENSION', '4');

		const store = await createDocumentStoreFromEnv({ logger });

		expect(store.toJSON()).toMatchObject({
			type: 'in-memory',
			init_parameters: { collectionName: 'notes', embeddingDimension: 4 },
		});
	});

	it('should reject an unknown backend in the environment', async () => {
		vi.stubEnv('DOCSTORE_BACKEND', 'elasticsearch');

		await expect(createDocumentStoreFromEnv({ logger })).rejects.toThrow('Invalid environment');
	});
});
