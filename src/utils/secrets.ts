import type { ApplicationSecrets, SecretLookup, SecretName, SecretsProvider } from '../types/index.js';
import { MissingCredentialError } from './errors.js';

export const SECRET_NAMES: readonly SecretName[] = ['tracingApiKey', 'llmApiKey', 'llmProjectId', 'wikiAccessToken'];

/**
 * Fixed service/account pairs for every credential the agent may use.
 */
export const SECRET_LOOKUPS: Record<SecretName, SecretLookup> = {
    tracingApiKey: { service: 'wikisearch/langsmith', account: 'api-key', envVar: 'LANGSMITH_API_KEY' },
    llmApiKey: { service: 'wikisearch/openai', account: 'api-key', envVar: 'OPENAI_API_KEY' },
    llmProjectId: { service: 'wikisearch/openai', account: 'project-id', envVar: 'OPENAI_PROJECT_ID' },
    wikiAccessToken: { service: 'wikisearch/wikipedia', account: 'access-token', envVar: 'WIKIPEDIA_ACCESS_TOKEN' },
};

/**
 * Secret store backed by environment variables. Each service/account pair
 * maps to the `envVar` of its lookup; empty values count as absent.
 */
export class EnvSecretsProvider implements SecretsProvider {
    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

    async getSecret(service: string, account: string): Promise<string | null> {
        const lookup = Object.values(SECRET_LOOKUPS).find(
            (l) => l.service === service && l.account === account
        );
        if (!lookup) return null;

        const value = this.env[lookup.envVar];
        return value ? value : null;
    }
}

/**
 * Fetch all credentials once. The returned record is frozen.
 */
export async function fetchSecrets(provider: SecretsProvider): Promise<ApplicationSecrets> {
    const [tracingApiKey, llmApiKey, llmProjectId, wikiAccessToken] = await Promise.all([
        lookup(provider, 'tracingApiKey'),
        lookup(provider, 'llmApiKey'),
        lookup(provider, 'llmProjectId'),
        lookup(provider, 'wikiAccessToken'),
    ]);

    return Object.freeze({ tracingApiKey, llmApiKey, llmProjectId, wikiAccessToken });
}

function lookup(provider: SecretsProvider, name: SecretName): Promise<string | null> {
    const { service, account } = SECRET_LOOKUPS[name];
    return provider.getSecret(service, account);
}

/**
 * Get a credential or fail with `MissingCredentialError`.
 */
export function requireSecret(secrets: ApplicationSecrets, name: SecretName): string {
    const value = secrets[name];
    if (value === null) {
        throw new MissingCredentialError(name);
    }
    return value;
}

/**
 * Names of the credentials that are present, for logging. Never the values.
 */
export function presentSecretNames(secrets: ApplicationSecrets): SecretName[] {
    return SECRET_NAMES.filter((name) => secrets[name] !== null);
}
