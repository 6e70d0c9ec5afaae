import Groq from 'groq-sdk';
import type { NarrativeModel, NarrativePrompt } from '../causal/narrative-generator.js';

const DEFAULT_MODEL = 'llama-3.1-8b-instant';

/**
 * Narrative backend on Groq's hosted chat completions.
 *
 * Ready whenever an API key was supplied; request failures propagate to the
 * caller, which falls back to templates.
 */
export class GroqNarrativeModel implements NarrativeModel {
    readonly #client: Groq | null;
    readonly #model: string;

    /**
     * @param apiKey - Groq API key (GROQ_API_KEY). Empty disables the model.
     * @param model  - Chat model ID; defaults to `llama-3.1-8b-instant`.
     */
    constructor(apiKey: string, model: string = DEFAULT_MODEL) {
        this.#client = apiKey.trim() ? new Groq({ apiKey }) : null;
        this.#model = model;
    }

    isReady(): boolean {
        return this.#client !== null;
    }

    async complete(prompt: NarrativePrompt, maxTokens: number): Promise<string> {
        if (!this.#client) {
            throw new Error('[GroqNarrativeModel] No API key configured.');
        }

        const completion = await this.#client.chat.completions.create({
            model: this.#model,
            messages: [
                { role: 'system', content: prompt.system },
                { role: 'user', content: prompt.user },
            ],
            max_tokens: maxTokens,
        });

        return completion.choices[0]?.message?.content ?? '';
    }
}
