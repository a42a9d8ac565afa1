import OpenAI, { AzureOpenAI } from 'openai';
import { DefaultAzureCredential, getBearerTokenProvider } from '@azure/identity';
import { config, type AppConfig } from '../config/app.js';
import { ConfigurationError } from '../utils/errors.js';

export type ChatCompletionRequest = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;
export type ChatCompletionReply = OpenAI.Chat.ChatCompletion;

/**
 * The slice of the OpenAI SDK the agent depends on. Both `OpenAI` and
 * `AzureOpenAI` satisfy it; tests pass plain objects with `vi.fn()` methods.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionRequest): Promise<ChatCompletionReply>;
    };
  };
}

export interface EmbeddingClient {
  embeddings: {
    create(body: OpenAI.EmbeddingCreateParams): Promise<OpenAI.CreateEmbeddingResponse>;
  };
}

export type ModelClient = ChatCompletionClient & EmbeddingClient;

const AZURE_SCOPE = 'https://cognitiveservices.azure.com/.default';

type ClientSettings = Pick<
  AppConfig,
  'OPENAI_API_KEY' | 'AZURE_OPENAI_ENDPOINT' | 'AZURE_OPENAI_API_KEY' | 'AZURE_OPENAI_API_VERSION'
>;

/**
 * Azure OpenAI is used when an endpoint is configured (API key, or Entra ID
 * through DefaultAzureCredential when no key is set); otherwise the public
 * OpenAI API with OPENAI_API_KEY.
 */
export function createModelClient(settings: ClientSettings = config): OpenAI {
  if (settings.AZURE_OPENAI_ENDPOINT) {
    if (settings.AZURE_OPENAI_API_KEY) {
      return new AzureOpenAI({
        endpoint: settings.AZURE_OPENAI_ENDPOINT,
        apiKey: settings.AZURE_OPENAI_API_KEY,
        apiVersion: settings.AZURE_OPENAI_API_VERSION
      });
    }
    return new AzureOpenAI({
      endpoint: settings.AZURE_OPENAI_ENDPOINT,
      apiVersion: settings.AZURE_OPENAI_API_VERSION,
      azureADTokenProvider: getBearerTokenProvider(new DefaultAzureCredential(), AZURE_SCOPE)
    });
  }

  if (!settings.OPENAI_API_KEY) {
    throw new ConfigurationError('Set OPENAI_API_KEY or AZURE_OPENAI_ENDPOINT to reach a language model.');
  }
  return new OpenAI({ apiKey: settings.OPENAI_API_KEY });
}

let sharedClient: OpenAI | null = null;

export function getModelClient(): OpenAI {
  if (!sharedClient) {
    sharedClient = createModelClient();
  }
  return sharedClient;
}
