/**
 * Content transformation utilities
 *
 * Turns generated lessons (outline-ordered LessonComponents) into the
 * editor's course content: sections of lessons of blocks, plus one flat
 * block list with global ordering. Pure: the same inputs always yield an
 * equal result.
 */

import { z } from 'zod';
import { QuizContentSchema } from '../schemas/generation';
import type {
  ComponentAlignment,
  CourseOutline,
  GeneratedLesson,
  LessonComponent,
} from '../types/generation';

export type BlockType = 'text' | 'heading' | 'knowledgeCheck';

export interface BlockAlignment {
  personas: string[];
  learningObjectives: string[];
  kpis: string[];
}

export interface CourseBlock {
  id: string;
  type: BlockType;
  content: string;
  order: number;
  lessonId?: string;
  alignment?: BlockAlignment;
  prompt?: string;
}

export interface EditorLesson {
  id: string;
  title: string;
  blocks: CourseBlock[];
}

export interface CourseSection {
  id: string;
  name: string;
  lessons: EditorLesson[];
}

export interface CourseContent {
  sections: CourseSection[];
  courseBlocks: CourseBlock[];
}

const TextContentSchema = z.object({ html: z.string().default(''), plaintext: z.string().default('') });
const HeadingContentSchema = z.object({ level: z.number().default(2), text: z.string().default('') });
const ImageContentSchema = z.object({
  url: z.string().default(''),
  altText: z.string().default(''),
  caption: z.string().optional(),
});

function parseContentJson<T>(contentJson: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
  let raw: unknown;
  try {
    raw = JSON.parse(contentJson);
  } catch {
    return fallback;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : fallback;
}

function transformAlignment(alignment?: ComponentAlignment): BlockAlignment | undefined {
  if (!alignment) return undefined;
  return {
    personas: [...alignment.personaIds],
    learningObjectives: [...alignment.learningObjectiveIds],
    kpis: [...alignment.kpiIds],
  };
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(str: string): string {
  return str.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Transform a single LessonComponent to a CourseBlock
 */
export function lessonComponentToCourseBlock(component: LessonComponent): CourseBlock {
  const base = {
    id: component.id,
    order: component.order,
    alignment: transformAlignment(component.alignment),
  };

  switch (component.type) {
    case 'text': {
      const content = parseContentJson(component.contentJson, TextContentSchema, { html: '', plaintext: '' });
      return { ...base, type: 'text', content: content.html || content.plaintext };
    }
    case 'heading': {
      const content = parseContentJson(component.contentJson, HeadingContentSchema, { level: 2, text: '' });
      return { ...base, type: 'heading', content: content.text };
    }
    case 'image': {
      const content = parseContentJson(component.contentJson, ImageContentSchema, { url: '', altText: '' });
      const caption = content.caption ? `<figcaption>${escapeHtml(content.caption)}</figcaption>` : '';
      return {
        ...base,
        type: 'text',
        content: `<figure><img src="${escapeHtml(content.url)}" alt="${escapeHtml(content.altText)}" />${caption}</figure>`,
      };
    }
    case 'quiz':
      // The knowledge-check editor reads the quiz JSON as-is.
      return { ...base, type: 'knowledgeCheck', content: component.contentJson };
    default: {
      const unreachable: never = component.type;
      return { ...base, type: 'text', content: `[Unknown component type: ${String(unreachable)}]` };
    }
  }
}

export function generatedLessonToLesson(lesson: GeneratedLesson): EditorLesson {
  const sorted = [...lesson.components].sort((a, b) => a.order - b.order);
  return {
    id: lesson.id,
    title: lesson.title,
    blocks: sorted.map(lessonComponentToCourseBlock),
  };
}

/**
 * Group generated lessons by outline section, in outline lesson order.
 * Lessons whose section is not in the outline are left out.
 */
export function generatedLessonsToCourseContent(lessons: GeneratedLesson[], outline: CourseOutline): CourseContent {
  const sections: CourseSection[] = [];
  const courseBlocks: CourseBlock[] = [];
  let globalOrder = 0;

  for (const outlineSection of outline.sections) {
    const positions = new Map(outlineSection.lessons.map((ol, index) => [ol.id, index]));
    const sectionLessons = lessons
      .filter((l) => l.sectionId === outlineSection.id)
      .sort((a, b) => (positions.get(a.outlineLessonId) ?? Infinity) - (positions.get(b.outlineLessonId) ?? Infinity));

    const editorLessons = sectionLessons.map((lesson) => {
      const editorLesson = generatedLessonToLesson(lesson);
      for (const block of editorLesson.blocks) {
        courseBlocks.push({ ...block, order: globalOrder++, lessonId: lesson.id });
      }
      return editorLesson;
    });

    sections.push({ id: outlineSection.id, name: outlineSection.title, lessons: editorLessons });
  }

  return { sections, courseBlocks };
}

/**
 * Swap in a regenerated component, keeping the block's position, prompt and
 * (when the new component has none) its alignment.
 */
export function transformRegeneratedComponent(component: LessonComponent, existingBlock: CourseBlock): CourseBlock {
  const next = lessonComponentToCourseBlock(component);
  return {
    ...next,
    order: existingBlock.order,
    lessonId: existingBlock.lessonId,
    alignment: next.alignment ?? existingBlock.alignment,
    prompt: existingBlock.prompt,
  };
}

/**
 * A quiz needs a question, at least two options and a correct answer id.
 */
export function validateQuizContent(contentJson: string): boolean {
  let raw: unknown;
  try {
    raw = JSON.parse(contentJson);
  } catch {
    return false;
  }
  return QuizContentSchema.safeParse(raw).success;
}
