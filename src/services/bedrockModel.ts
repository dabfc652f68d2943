/**
 * Claude text completion over AWS Bedrock.
 */
import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';

export interface CompletionOptions {
  system?: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

/**
 * Anything that turns a prompt into text. Errors are thrown as the SDK
 * throws them; callers decide what is retryable.
 */
export interface TextModel {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export interface BedrockCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

const responseSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }))
    .min(1),
});

export class BedrockClaudeModel implements TextModel {
  private client: BedrockRuntimeClient;

  constructor(
    region: string,
    credentials: BedrockCredentials,
    private readonly modelId: string
  ) {
    this.client = new BedrockRuntimeClient({ region, credentials });
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const request = {
      anthropic_version: 'bedrock-2023-05-31',
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      ...(options.system ? { system: options.system } : {}),
      messages: [
        {
          role: 'user',
          content: prompt,
        },
      ],
    };

    const command = new InvokeModelCommand({
      modelId: this.modelId,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify(request),
    });

    const response = await this.client.send(command, {
      abortSignal: AbortSignal.timeout(options.timeoutMs),
    });

    if (!response.body) {
      throw new Error('Empty response from Claude');
    }

    const parsed = responseSchema.safeParse(JSON.parse(new TextDecoder().decode(response.body)));
    if (!parsed.success) {
      throw new Error('Invalid response format from Claude');
    }

    return parsed.data.content
      .map((block) => block.text ?? '')
      .join('')
      .trim();
  }

  destroy(): void {
    this.client.destroy();
  }
}
