/**
 * Workflow Steps
 *
 * The seven units of work, in execution order. Each step declares which
 * earlier results it reads; the engine hands it only those.
 */

import slugify from 'slugify';
import { GenerationSuccess } from '../orchestration/types';
import { ProviderId } from '../providers/ai/AiProvider';
import {
    ANALYSIS_PROMPT,
    EDITING_PROMPT,
    FEEDBACK_PROMPT,
    IMPROVEMENT_PROMPT,
    PLANNING_PROMPT,
    PUBLISHING_PROMPT,
    QUALITY_PROMPT,
    RESEARCH_PROMPT,
    WRITING_PROMPT,
} from '../providers/ai/prompts';
import { arrayField, isRecord, parseJsonResponse, parseScore, stringField } from './parse';
import { StepData, StepName, StepResult, WORKFLOW_STEPS } from './types';

/** Used when the quality grader answers without a number */
export const DEFAULT_QUALITY_SCORE = 75;

export interface StepGenerateOptions {
    maxTokens?: number;
    temperature?: number;
}

export interface StepSettings {
    writingMaxIterations: number;
    writingQualityThreshold: number;
}

export interface StepContext {
    topic: string;
    /** Results of the steps listed in `dependsOn`, nothing else */
    inputs: Partial<Record<StepName, StepResult>>;
    settings: StepSettings;
    /**
     * Run one generation through the orchestrator.
     * Rejects with AllProvidersExhaustedError when every provider fails.
     */
    generate(prompt: string, options?: StepGenerateOptions): Promise<GenerationSuccess>;
}

export interface StepOutput {
    content: string;
    data: StepData;
    providerUsed: ProviderId;
}

export interface StepDefinition {
    name: StepName;
    dependsOn: readonly StepName[];
    run(context: StepContext): Promise<StepOutput>;
}

function inputData(context: StepContext, step: StepName): StepData {
    return context.inputs[step]?.data ?? {};
}

function output(call: GenerationSuccess, extra: StepData = {}): StepOutput {
    return {
        content: call.content,
        data: { ...parseJsonResponse(call.content), ...extra },
        providerUsed: call.providerUsed,
    };
}

export function countWords(text: string): number {
    return text
        .replace(/<[^>]+>/g, ' ')
        .split(/\s+/)
        .filter(w => w.length > 0)
        .length;
}

/**
 * Flatten a written article into plain text for grading and word counts
 */
export function articleText(data: StepData, fallback: string): string {
    const sections = arrayField(data, 'sections')
        .filter(isRecord)
        .map(section => `${stringField(section, 'heading')}\n${stringField(section, 'content')}`);

    if (sections.length === 0) {
        return fallback;
    }
    return [stringField(data, 'title'), ...sections].join('\n\n');
}

const research: StepDefinition = {
    name: 'research',
    dependsOn: [],
    async run(context) {
        const call = await context.generate(RESEARCH_PROMPT(context.topic));
        return output(call, { researchedAt: new Date().toISOString() });
    },
};

const planning: StepDefinition = {
    name: 'planning',
    dependsOn: ['research'],
    async run(context) {
        const call = await context.generate(PLANNING_PROMPT(context.topic, inputData(context, 'research')));
        return output(call);
    },
};

/**
 * Draft, grade, and redraft with feedback until the grade clears the
 * threshold or the iteration budget runs out.
 */
const writing: StepDefinition = {
    name: 'writing',
    dependsOn: ['planning'],
    async run(context) {
        const { writingMaxIterations, writingQualityThreshold } = context.settings;
        const maxIterations = Math.max(1, writingMaxIterations);
        const headings = arrayField(inputData(context, 'planning'), 'proposedHeadings');

        let feedback: string | undefined;
        let draft = await context.generate(WRITING_PROMPT(context.topic, headings), { maxTokens: 8192 });
        let article = parseJsonResponse(draft.content);
        let qualityScore = DEFAULT_QUALITY_SCORE;
        let iterations = 1;

        for (;;) {
            const text = articleText(article, draft.content);
            const grade = await context.generate(QUALITY_PROMPT(text), { maxTokens: 16, temperature: 0 });
            qualityScore = parseScore(grade.content, DEFAULT_QUALITY_SCORE);

            if (qualityScore >= writingQualityThreshold || iterations >= maxIterations) {
                break;
            }

            feedback = (await context.generate(FEEDBACK_PROMPT(text, qualityScore))).content;
            draft = await context.generate(WRITING_PROMPT(context.topic, headings, feedback), { maxTokens: 8192 });
            article = parseJsonResponse(draft.content);
            iterations++;
        }

        const extra: StepData = {
            qualityScore,
            iterations,
            wordCount: countWords(articleText(article, draft.content)),
        };
        if (qualityScore < writingQualityThreshold) {
            extra.note = 'Iteration limit reached before the quality threshold; manual review recommended';
        }

        return output(draft, extra);
    },
};

const editing: StepDefinition = {
    name: 'editing',
    dependsOn: ['writing'],
    async run(context) {
        const written = context.inputs.writing;
        const article = inputData(context, 'writing');
        const call = await context.generate(EDITING_PROMPT(
            stringField(article, 'title', context.topic),
            articleText(article, written?.content ?? '')
        ));
        return output(call);
    },
};

const publishing: StepDefinition = {
    name: 'publishing',
    dependsOn: ['writing', 'editing'],
    async run(context) {
        const article = inputData(context, 'writing');
        const title = stringField(article, 'title', context.topic);
        const call = await context.generate(PUBLISHING_PROMPT(
            context.topic,
            title,
            stringField(article, 'metaDescription')
        ));

        return output(call, {
            slug: slugify(title, { lower: true, strict: true }),
            readyForPublish: true,
        });
    },
};

const analysis: StepDefinition = {
    name: 'analysis',
    dependsOn: ['writing', 'editing'],
    async run(context) {
        const article = inputData(context, 'writing');
        const wordCount = typeof article.wordCount === 'number' ? article.wordCount : 0;
        const call = await context.generate(ANALYSIS_PROMPT(
            context.topic,
            stringField(article, 'title', context.topic),
            wordCount,
            inputData(context, 'editing').scores
        ));
        return output(call);
    },
};

const improvement: StepDefinition = {
    name: 'improvement',
    dependsOn: ['research', 'planning', 'writing', 'editing', 'publishing', 'analysis'],
    async run(context) {
        const summary: StepData = {
            opportunity: inputData(context, 'research').seoOpportunity,
            concept: inputData(context, 'planning').articleConcept,
            article: {
                title: inputData(context, 'writing').title,
                qualityScore: inputData(context, 'writing').qualityScore,
                wordCount: inputData(context, 'writing').wordCount,
            },
            editorialScores: inputData(context, 'editing').scores,
            slug: inputData(context, 'publishing').slug,
            predictedPerformance: inputData(context, 'analysis').predictedPerformance,
        };

        const call = await context.generate(IMPROVEMENT_PROMPT(context.topic, summary));
        return output(call);
    },
};

export const STEP_DEFINITIONS: readonly StepDefinition[] = [
    research,
    planning,
    writing,
    editing,
    publishing,
    analysis,
    improvement,
];

/**
 * Step after `step`, or undefined after the last one
 */
export function nextStep(step: StepName): StepName | undefined {
    return WORKFLOW_STEPS[WORKFLOW_STEPS.indexOf(step) + 1];
}
