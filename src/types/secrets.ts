/**
 * Credentials fetched once at startup. Every field is optional; callers that
 * need one go through `requireSecret()`.
 */
export interface ApplicationSecrets {
    /** LangSmith API key */
    readonly tracingApiKey: string | null;
    /** OpenAI API key */
    readonly llmApiKey: string | null;
    /** OpenAI project id */
    readonly llmProjectId: string | null;
    /** Wikipedia personal access token, handed to the tool server */
    readonly wikiAccessToken: string | null;
}

export type SecretName = keyof ApplicationSecrets;

/**
 * Where a credential lives: a service/account pair in the secret store, plus
 * the environment variable the env-backed store reads it from.
 */
export interface SecretLookup {
    service: string;
    account: string;
    envVar: string;
}

/**
 * A credential store. Returns null when nothing is stored for the pair.
 */
export interface SecretsProvider {
    getSecret(service: string, account: string): Promise<string | null>;
}
