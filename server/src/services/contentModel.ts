import OpenAI from 'openai'

export interface CompletionRequest {
  system: string
  prompt: string
  temperature: number
  maxTokens: number
}

/** Anything that turns a prompt into text. The OpenAI client in production, a fake in tests. */
export interface ContentModel {
  complete(request: CompletionRequest): Promise<string>
}

export class OpenAIContentModel implements ContentModel {
  private readonly client: OpenAI

  constructor(
    apiKey: string,
    private readonly model: string
  ) {
    this.client = new OpenAI({ apiKey })
  }

  async complete(request: CompletionRequest): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    })
    const content = completion.choices[0]?.message?.content?.trim()
    if (!content) throw new Error(`${this.model} returned an empty completion`)
    return content
  }
}

/** null when no credential is configured; callers fall back to the static template. */
export function createContentModel(config: { openaiApiKey?: string; openaiModel: string }): ContentModel | null {
  if (!config.openaiApiKey) return null
  return new OpenAIContentModel(config.openaiApiKey, config.openaiModel)
}
