// queue-pump/src/prompts.ts
// Prompt templates for outline, lesson, component and knowledge generation.

import type {
  CourseGenerationInput,
  KnowledgeSource,
  LessonComponent,
  OutlineLesson,
  OutlineSection,
  TargetAudience,
} from "../../src/lib/types/generation";

export const SYSTEM_PROMPT = `You are an instructional designer writing corporate training courses.

Rules:
1. Stay faithful to the supplied knowledge sources. Do not invent policies, numbers or product facts.
2. Write for the target audiences described, at their experience level.
3. Every lesson must serve the desired outcome.
4. Quiz questions have exactly one correct option.

Output only valid JSON with no markdown or additional text.`;

const OUTLINE_SHAPE = `
Output shape:
{
  "sections": [
    {
      "title": string,
      "description": string,
      "lessons": [
        { "title": string, "description": string, "estimatedDurationMinutes": number, "learningObjectives": string[] }
      ]
    }
  ]
}
Create 2-6 sections with 1-5 lessons each.`;

const LESSON_SHAPE = `
Output shape:
{
  "title": string,
  "segueText": string,
  "components": [
    { "type": "heading", "content": { "level": 2, "text": string } }
    | { "type": "text", "content": { "html": string, "plaintext": string } }
    | { "type": "image", "content": { "url": string, "altText": string, "caption": string } }
    | { "type": "quiz", "content": { "question": string, "questionType": "multiple_choice" | "true_false",
        "options": [{ "id": string, "text": string }], "correctAnswerId": string, "explanation": string } }
  ]
}
Use 3-8 components. End with at least one quiz.`;

const MAX_SOURCE_CHARS = 6000;

function knowledgeBlock(sources: KnowledgeSource[]): string {
  if (!sources.length) return "Knowledge sources: none supplied.";
  let budget = MAX_SOURCE_CHARS;
  const parts = sources.map((s, i) => {
    const body = [s.summary, ...s.chunks].join("\n").slice(0, Math.max(0, budget));
    budget -= body.length;
    return `Source ${i + 1}: ${s.title}\n${body}`;
  });
  return `Knowledge sources:\n\n${parts.join("\n\n")}`;
}

function audienceBlock(audiences: TargetAudience[]): string {
  const lines = audiences.map((a) => `- ${a.name} (${a.experienceLevel}): ${a.description}`);
  return `Target audiences:\n${lines.join("\n")}`;
}

export function buildOutlinePrompt(params: {
  input: CourseGenerationInput;
  knowledge: KnowledgeSource[];
  audiences: TargetAudience[];
}): string {
  const { input, knowledge, audiences } = params;
  const extra = input.additionalContext ? `\nAdditional context:\n${input.additionalContext}\n` : "";
  return `Design a course outline.

Title: ${input.desiredOutcome}
Desired outcome: ${input.desiredOutcome}

${audienceBlock(audiences)}
${extra}
${knowledgeBlock(knowledge)}
${OUTLINE_SHAPE}`;
}

export function buildLessonPrompt(params: {
  input: CourseGenerationInput;
  section: OutlineSection;
  lesson: OutlineLesson;
  knowledge: KnowledgeSource[];
  audiences: TargetAudience[];
}): string {
  const { input, section, lesson, knowledge, audiences } = params;
  const objectives = lesson.learningObjectives.length
    ? lesson.learningObjectives.map((o) => `- ${o}`).join("\n")
    : "- (none listed)";
  return `Write the content of one lesson.

Title: ${lesson.title}
Section: ${section.title}
Lesson description: ${lesson.description}
Course outcome: ${input.desiredOutcome}
Learning objectives:
${objectives}

${audienceBlock(audiences)}

${knowledgeBlock(knowledge)}
${LESSON_SHAPE}`;
}

export function buildComponentPrompt(params: { component: LessonComponent; lessonTitle: string; instruction: string }): string {
  const { component, lessonTitle, instruction } = params;
  return `Rewrite one component of a lesson.

Title: ${lessonTitle}
Component type: ${component.type} (keep this type)
Current content JSON:
${component.contentJson}

Requested change:
${instruction}

Output shape: { "type": "${component.type}", "content": { ...same fields as the current content } }`;
}

export function buildSmeSummaryPrompt(documents: Array<{ title: string; text: string }>): string {
  const body = documents
    .map((d) => `## ${d.title}\n${d.text}`)
    .join("\n\n")
    .slice(0, MAX_SOURCE_CHARS * 2);
  return `Summarize the subject-matter expert material below for later course writing.

Title: ${documents[0]?.title ?? "Source material"}

${body}

Output shape: { "summary": string, "keyPoints": string[] }`;
}
