/**
 * Approval gate: one live outline per course, one full_course job per
 * approval, rejection feedback and in-place edits.
 */

import { NotFoundError, PreconditionError, ValidationError } from '../../src/lib/errors';
import { REVIEWER_FEEDBACK_PREFIX, withReviewerFeedback } from '../../src/server/approval';
import { courseInput, createTestPipeline, ctx, draftSections, otherTenant, type TestPipeline } from '../helpers/pipeline';

describe('ApprovalGate', () => {
  let p: TestPipeline;

  beforeEach(() => {
    p = createTestPipeline();
  });

  function record() {
    return p.approval.recordGeneratedOutline({
      tenantId: ctx.tenantId,
      requestedByUserId: ctx.userId,
      generationInput: courseInput,
      sections: draftSections,
      sourceJobId: null,
    });
  }

  it('stores each generation as the next version and supersedes the live one', async () => {
    const v1 = await record();
    const v2 = await record();

    expect(v1.version).toBe(1);
    expect(v2.version).toBe(2);
    expect(v2.approvalStatus).toBe('pending_review');
    expect(v2.sections[0].lessons.map((l) => l.title)).toEqual(['Key Concepts', 'Why It Matters']);

    const history = await p.approval.list(ctx, 'course-1');
    expect(history.map((o) => [o.version, o.approvalStatus])).toEqual([
      [2, 'pending_review'],
      [1, 'rejected'],
    ]);
    expect(history[1].rejectionReason).toBe('Superseded by version 2');
    expect(history[1].supersededByOutlineId).toBe(v2.id);
  });

  it('looks outlines up by version', async () => {
    await record();
    await record();
    expect((await p.approval.get(ctx, 'course-1')).version).toBe(2);
    expect((await p.approval.get(ctx, 'course-1', 1)).version).toBe(1);
    await expect(p.approval.get(ctx, 'course-1', 7)).rejects.toThrow('Outline version 7 not found for course course-1');
    await expect(p.approval.get(ctx, 'course-2')).rejects.toThrow('No outline for course course-2');
  });

  it('submits exactly one full_course job when approvals race', async () => {
    const outline = await record();
    const results = await Promise.allSettled([
      p.approval.approve(ctx, 'course-1', outline.id),
      p.approval.approve(ctx, 'course-1', outline.id),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(PreconditionError);
    expect(rejected[0].reason.message).toBe(`Outline ${outline.id} is approved and cannot be approved`);

    const jobs = await p.orchestrator.list({ tenantId: ctx.tenantId, type: 'full_course' });
    expect(jobs).toHaveLength(1);
    expect(jobs[0].payload).toEqual({ courseId: 'course-1', outlineId: outline.id });

    const approved = await p.approval.get(ctx, 'course-1');
    expect(approved.approvalStatus).toBe('approved');
    expect(approved.approvedByUserId).toBe('user-1');
  });

  it('requires a reason to reject', async () => {
    const outline = await record();
    await expect(p.approval.reject(ctx, 'course-1', outline.id, '   ')).rejects.toThrow(
      new ValidationError('Rejection reason is required')
    );
    expect((await p.approval.get(ctx, 'course-1')).approvalStatus).toBe('pending_review');
  });

  it('regenerates with the reviewer feedback after a rejection', async () => {
    const outline = await record();
    const { outline: rejected, job } = await p.approval.reject(ctx, 'course-1', outline.id, ' Too shallow ');

    expect(rejected.approvalStatus).toBe('rejected');
    expect(rejected.rejectionReason).toBe('Too shallow');
    expect(job.type).toBe('course_outline');
    expect(job.payload.additionalContext).toBe(`${REVIEWER_FEEDBACK_PREFIX} Too shallow`);
    expect(job.payload.previousOutlineId).toBe(outline.id);
  });

  it('appends feedback after existing context', () => {
    const input = withReviewerFeedback({ ...courseInput, additionalContext: 'Keep it short' }, 'Add examples');
    expect(input.additionalContext).toBe('Keep it short\n\nReviewer feedback on previous outline: Add examples');
  });

  it('refuses to reject an approved outline', async () => {
    const outline = await record();
    await p.approval.approve(ctx, 'course-1', outline.id);
    await expect(p.approval.reject(ctx, 'course-1', outline.id, 'late')).rejects.toBeInstanceOf(PreconditionError);
  });

  it('hides outlines from other tenants', async () => {
    const outline = await record();
    await expect(p.approval.approve(otherTenant, 'course-1', outline.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('round-trips a revision request and asks for approval again', async () => {
    const outline = await record();
    const revising = await p.approval.requestRevision(ctx, 'course-1', outline.id, 'Split lesson two');
    expect(revising.approvalStatus).toBe('revision_requested');
    expect(revising.rejectionReason).toBe('Split lesson two');

    const pending = await p.approval.submitForReview(ctx, 'course-1', outline.id);
    expect(pending.approvalStatus).toBe('pending_review');
    expect(pending.rejectionReason).toBeNull();

    const page = await p.notifications.list('user-1');
    expect(page.notifications.map((n) => n.type)).toEqual(['approval_requested']);
    expect(page.notifications[0].message).toBe('Version 1 of the course outline is waiting for approval.');
  });

  describe('update', () => {
    it('keeps ids for existing entries and assigns new ones', async () => {
      const outline = await record();
      const section = outline.sections[0];
      const updated = await p.approval.update(ctx, 'course-1', outline.id, [
        {
          id: section.id,
          title: 'Foundations, revised',
          lessons: [{ id: section.lessons[0].id, title: 'Key Concepts' }, { title: 'Common Mistakes' }],
        },
      ]);

      expect(updated.sections).toHaveLength(1);
      expect(updated.sections[0].id).toBe(section.id);
      expect(updated.sections[0].title).toBe('Foundations, revised');
      expect(updated.sections[0].lessons[0].id).toBe(section.lessons[0].id);
      expect(updated.sections[0].lessons[1].title).toBe('Common Mistakes');
      expect(updated.sections[0].lessons[1].id).not.toBe(section.lessons[1].id);
    });

    it('rejects ids that are not in the outline', async () => {
      const outline = await record();
      await expect(
        p.approval.update(ctx, 'course-1', outline.id, [{ id: 'nope', title: 'X', lessons: [] }])
      ).rejects.toThrow('Unknown section id: nope');
    });

    it('keeps lessons that already have generated content', async () => {
      const outline = await record();
      const section = outline.sections[0];
      const [kept, generated] = section.lessons;
      await p.stores.lessons.upsert({
        id: 'lesson-1',
        tenantId: ctx.tenantId,
        courseId: 'course-1',
        sectionId: section.id,
        outlineLessonId: generated.id,
        title: generated.title,
        segueText: null,
        components: [],
        generatedAt: '2026-03-01T10:00:00.000Z',
      });

      await expect(
        p.approval.update(ctx, 'course-1', outline.id, [
          { id: section.id, title: section.title, lessons: [{ id: kept.id, title: kept.title }] },
        ])
      ).rejects.toThrow('Lesson "Why It Matters" already has generated content and cannot be removed');
    });

    it('locks approved outlines', async () => {
      const outline = await record();
      await p.approval.approve(ctx, 'course-1', outline.id);
      await expect(
        p.approval.update(ctx, 'course-1', outline.id, [{ title: 'New', lessons: [] }])
      ).rejects.toThrow(`Outline ${outline.id} is approved and can no longer be edited`);
    });
  });
});
