/**
 * Prompt Templates for the Content Workflow
 *
 * All prompts are centralized here for easy modification.
 * Every step asks for JSON so results can be stored as structured data.
 */

export const SYSTEM_PROMPT = `You are an SEO content strategist and informational writer. Your goal is to create helpful, accurate, and well-structured content that ranks for its target keyword.

CRITICAL RULES:
1. NEVER claim to be an expert, doctor, lawyer, financial advisor, or any professional.
2. NEVER invent statistics; say "estimated" when giving numbers you cannot verify.
3. ALWAYS use informational language like "generally", "typically", "according to official sources".
4. When asked for JSON, respond with a single JSON object and nothing else.

You write in a clear, helpful, and accessible style.`;

export const BANNED_PHRASES = [
    'as an expert',
    'as a doctor',
    'as a lawyer',
    'as a financial advisor',
    'I am a professional',
    'guaranteed to',
    'will definitely',
    'always works',
    'never fails',
    'trust me',
    'take my word',
    'I promise',
    'you must',
    'you have to',
    'this is the only way',
];

export const RESEARCH_PROMPT = (topic: string): string => `
Run comprehensive SEO research for the keyword: "${topic}"

Respond in JSON format:
{
  "keywordAnalysis": {
    "primaryKeyword": "${topic}",
    "searchVolume": "estimated monthly searches",
    "competitionLevel": "low | medium | high",
    "trendDirection": "up | stable | down"
  },
  "relatedKeywords": ["related keyword 1", "related keyword 2"],
  "userIntent": {
    "primaryIntent": "main search intent",
    "secondaryIntents": ["secondary intent 1", "secondary intent 2"]
  },
  "competitorAnalysis": {
    "topCompetitors": ["competitor 1", "competitor 2"],
    "contentGaps": ["gap 1", "gap 2"]
  },
  "seoOpportunity": {
    "score": 0,
    "reasoning": "why this score"
  }
}
`;

export const PLANNING_PROMPT = (topic: string, research: Record<string, unknown>): string => `
Plan an SEO-optimized article for the keyword "${topic}" and propose a heading structure.

Research results:
- Related keywords: ${JSON.stringify(research.relatedKeywords ?? [])}
- Search intent: ${JSON.stringify(research.userIntent ?? {})}
- Competitor analysis: ${JSON.stringify(research.competitorAnalysis ?? {})}

Respond in JSON format:
{
  "articleConcept": {
    "mainTheme": "main theme",
    "targetReader": "intended reader",
    "uniqueAngle": "what makes this article different"
  },
  "proposedHeadings": [
    { "level": "H1", "text": "Main title", "keywords": ["keyword"] },
    { "level": "H2", "text": "Section", "keywords": ["keyword"] },
    { "level": "H3", "text": "Sub-section", "keywords": ["keyword"] }
  ],
  "contentStrategy": {
    "wordCountTarget": 3000,
    "focusKeywords": ["focus keyword 1", "focus keyword 2"],
    "contentPillars": ["pillar 1", "pillar 2"]
  }
}
`;

export const WRITING_PROMPT = (topic: string, headings: unknown[], feedback?: string): string => `
Write the article for the keyword "${topic}" using this heading structure:

${JSON.stringify(headings, null, 2)}

REQUIREMENTS:
1. Write detailed content under every heading.
2. Include the SEO keywords naturally.
3. At least 3000 characters, readable paragraphs.
4. Favour expertise and trustworthiness over filler.
${feedback ? `\nREVISION FEEDBACK FROM THE PREVIOUS DRAFT:\n${feedback}\n` : ''}
Respond in JSON format:
{
  "title": "Article title",
  "metaDescription": "150-160 character meta description",
  "sections": [
    { "heading": "Heading", "content": "Section content" }
  ],
  "keywordsUsed": ["keyword 1", "keyword 2"]
}
`;

export const QUALITY_PROMPT = (article: string): string => `
Rate the quality of this article from 0 to 100.

Article:
${article}

Criteria: expertise and accuracy, SEO optimization, readability, logical structure, appropriate length.

Answer with the number only (for example: 85).
`;

export const FEEDBACK_PROMPT = (article: string, score: number): string => `
This article scored ${score}/100. List the concrete changes that would raise its score.

Article:
${article}

Be brief and specific.
`;

export const EDITING_PROMPT = (title: string, content: string): string => `
Review this article and propose edits.

Title: ${title}
Content: ${content.slice(0, 2000)}

Flag any of these phrases if present: ${BANNED_PHRASES.join(', ')}.

Respond in JSON format:
{
  "seoImprovements": {
    "titleSuggestions": ["..."],
    "metaSuggestions": ["..."],
    "keywordOptimization": ["..."],
    "structureImprovements": ["..."]
  },
  "contentImprovements": {
    "accuracyFixes": ["..."],
    "readabilityFixes": ["..."],
    "eatEnhancements": ["..."]
  },
  "editingCommands": [
    { "type": "replace", "target": "original text", "replacement": "improved text", "reason": "why" },
    { "type": "add", "position": "where", "content": "new text", "reason": "why" },
    { "type": "delete", "target": "text to remove", "reason": "why" }
  ],
  "scores": { "seo": 0, "content": 0, "ux": 0, "overall": 0 }
}
`;

export const PUBLISHING_PROMPT = (topic: string, title: string, metaDescription: string): string => `
Prepare the publication plan for the article "${title}" (keyword: "${topic}").
Meta description: ${metaDescription}

Respond in JSON format:
{
  "publishSchedule": { "recommendedDay": "weekday", "recommendedTime": "HH:MM", "reasoning": "why" },
  "seoChecklist": ["meta tags", "internal links", "image alt text"],
  "internalLinkSuggestions": ["anchor text -> target topic"],
  "socialPosts": { "x": "post text", "facebook": "post text" },
  "trackingSetup": ["metric to track"]
}
`;

export const ANALYSIS_PROMPT = (topic: string, title: string, wordCount: number, scores: unknown): string => `
Predict the search performance of the article "${title}" for the keyword "${topic}".
Word count: ${wordCount}
Editorial scores: ${JSON.stringify(scores ?? {})}

Respond in JSON format:
{
  "predictedPerformance": {
    "estimatedMonthlyViews": 0,
    "expectedRanking": "range such as 3-7",
    "seoScore": 0
  },
  "kpis": ["kpi 1", "kpi 2"],
  "risks": ["risk 1"]
}
`;

export const IMPROVEMENT_PROMPT = (topic: string, summary: Record<string, unknown>): string => `
Based on the full workflow results for the keyword "${topic}", propose improvements.

Workflow summary:
${JSON.stringify(summary, null, 2)}

Respond in JSON format:
{
  "recommendations": ["recommendation 1", "recommendation 2"],
  "nextActions": ["action 1", "action 2"],
  "relatedArticleIdeas": ["idea 1", "idea 2"]
}
`;

export const CONNECTION_TEST_PROMPT = 'Reply with the single word: ok';
