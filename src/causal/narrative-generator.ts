import type {
    Hypothesis,
    NarrativeOptions,
    NarrativeSource,
    ToolObservation,
} from '../types/causal.js';
import { logThought } from '../utils/logger.js';

/** Chat-style prompt handed to a language model. */
export interface NarrativePrompt {
    system: string;
    user: string;
}

/** A text-generation backend. `isReady` is checked before every call. */
export interface NarrativeModel {
    isReady(): boolean;
    complete(prompt: NarrativePrompt, maxTokens: number): Promise<string>;
}

export interface NarrativeGeneratorOptions {
    maxTokens?: number;
}

const DEFAULT_MAX_TOKENS = 120;

export const NARRATIVE_SYSTEM_PROMPT =
    'You are a supportive friend who understands health data. '
    + 'Stay strictly within the provided evidence. '
    + 'Do not add conditions, diseases, or medical advice not present in the input. '
    + 'Never use clinical jargon. Speak like a knowledgeable peer, not a doctor. '
    + 'Be warm but specific: always reference the actual numbers and foods from the data.';

function significantWords(text: string): string[] {
    return text
        .toLowerCase()
        .split(/[^\p{L}\p{N}]+/u)
        .filter((word) => word.length > 3);
}

/**
 * True when the output mentions a causal-chain term or a symptom word of more
 * than three characters. Anything else is treated as unrelated to the evidence.
 */
export function isGrounded(output: string, symptom: string, causalChain: readonly string[]): boolean {
    const lowered = output.toLowerCase();
    const terms = [...causalChain.flatMap(significantWords), ...significantWords(symptom)];
    return terms.some((term) => lowered.includes(term));
}

export function buildNarrativePrompt(
    symptom: string,
    hypothesis: Hypothesis,
    observations: readonly ToolObservation[],
): NarrativePrompt {
    const evidence = observations.find((observation) => observation.detail !== '')?.detail
        ?? hypothesis.supportingEvidence[0]
        ?? 'No tool evidence';
    const lines = [
        `Explain why I'm experiencing "${symptom}" in exactly 3 sentences:`,
        '1. WHY: What caused it (use the cause below)',
        '2. EVIDENCE: How the data shows the connection (use the numbers below)',
        '3. FIX: One easy thing I could try next time (frame as a choice, not a command)',
        '',
        `Primary cause: ${hypothesis.description}`,
        `Cause type: ${hypothesis.debtType}`,
        `Confidence: ${Math.trunc(hypothesis.confidence * 100)}%`,
        `Causal chain: ${hypothesis.causalChain.join(' → ')}`,
        `Evidence: ${evidence}`,
    ];
    return { system: NARRATIVE_SYSTEM_PROMPT, user: lines.join('\n') };
}

/** Why → evidence → fix, in a supportive tone, per category. */
export function templateNarrative(
    symptom: string,
    hypothesis: Hypothesis,
    observations: readonly ToolObservation[],
): string {
    const confidence = Math.trunc(hypothesis.confidence * 100);
    const chain = hypothesis.causalChain.join(' → ');
    const detail = observations.map((observation) => observation.detail).find((text) => text !== '');
    const subject = symptom.toLowerCase();

    let why: string;
    let evidence: string;
    let fix: string;

    switch (hypothesis.debtType) {
        case 'metabolic':
            why = `Looks like your ${subject} is connected to what you ate recently`;
            evidence = detail === undefined
                ? `Your glucose and meal data point to a metabolic pattern (${confidence}% confidence): ${chain}.`
                : `Here's what the data shows (${confidence}% confidence): ${detail}.`;
            fix = 'A short walk after your next meal could help smooth things out.';
            break;
        case 'digital':
            why = `Your ${subject} seems tied to your screen time patterns`;
            evidence = detail === undefined
                ? `Extended passive screen time has been building up attention fatigue (${confidence}% confidence): ${chain}.`
                : `The data shows (${confidence}% confidence): ${detail}.`;
            fix = 'Taking a quick break from screens when you notice the pull might help.';
            break;
        case 'somatic':
            why = `Your ${subject} looks like it has roots in your environment or recovery`;
            evidence = detail === undefined
                ? `Sleep and environmental factors are playing a role (${confidence}% confidence): ${chain}.`
                : `Here's what stands out (${confidence}% confidence): ${detail}.`;
            fix = 'Getting some extra rest could make a real difference.';
            break;
    }

    return `${why}. ${evidence} ${fix}`;
}

/**
 * Writes the narrative for one explanation.
 *
 * With a ready model and `allowModel`, the model's trimmed output is used when
 * it is non-empty and grounded. Every other case, including a model error,
 * gets the category template.
 */
export class NarrativeGenerator implements NarrativeSource {
    readonly #model: NarrativeModel | undefined;
    readonly #maxTokens: number;

    constructor(model?: NarrativeModel, options: NarrativeGeneratorOptions = {}) {
        this.#model = model;
        this.#maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    }

    async generate(
        symptom: string,
        hypothesis: Hypothesis,
        observations: readonly ToolObservation[],
        options: NarrativeOptions = {},
    ): Promise<string> {
        const model = this.#model;
        const allowModel = options.allowModel ?? true;
        if (allowModel && model && model.isReady()) {
            try {
                const prompt = buildNarrativePrompt(symptom, hypothesis, observations);
                const output = (await model.complete(prompt, this.#maxTokens)).trim();
                if (output !== '' && isGrounded(output, symptom, hypothesis.causalChain)) {
                    return output;
                }
                void logThought(`[NarrativeGenerator] Model output rejected as ungrounded for '${symptom}'.`);
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                void logThought(`[NarrativeGenerator] Model failed, using template: ${reason}`);
            }
        }

        return templateNarrative(symptom, hypothesis, observations);
    }
}
