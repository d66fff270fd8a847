import mongoose from 'mongoose';
import { IReview, Review } from '../models/Review';
import { SchedulingStore } from '../repositories/SchedulingStore';
import { Actor, Failure, fail } from '../types/scheduling';
import { normalizeName } from '../utils/validation';
import { NotificationDispatcher } from './notificationService';

export interface ReviewView {
  id: string;
  authorChatId: number;
  authorName?: string;
  text: string;
  createdAt: Date;
}

export type ReviewResult = { ok: true; review: ReviewView } | Failure<'ValidationError'>;

export const LATEST_REVIEWS_LIMIT = 20;
const MAX_REVIEW_LENGTH = 2000;

const toReview = (doc: IReview & { _id: unknown }): ReviewView => ({
  id: String(doc._id),
  authorChatId: doc.authorChatId,
  authorName: doc.authorName || undefined,
  text: doc.text,
  createdAt: doc.createdAt,
});

export class ReviewService {
  constructor(private readonly store: SchedulingStore, private readonly dispatcher: NotificationDispatcher) {}

  async create(author: Actor, text: unknown, authorName?: unknown): Promise<ReviewResult> {
    const body = typeof text === 'string' ? text.trim() : '';
    if (!body) return fail('ValidationError', 'Review text must not be empty');
    if (body.length > MAX_REVIEW_LENGTH) return fail('ValidationError', 'Review is too long');
    const name = typeof authorName === 'string' ? normalizeName(authorName) : null;

    const doc = await Review.create({
      authorChatId: author.chatId,
      authorName: name || undefined,
      text: body,
      createdAt: new Date(),
    });
    const review = toReview(doc.toObject());

    const admins = await this.store.listStaff({ isAdmin: true });
    for (const admin of admins) {
      await this.dispatcher.notify(admin.staffId, 'reviewPosted', { reviewId: review.id, clientName: review.authorName, text: review.text });
    }
    return { ok: true, review };
  }

  async listLatest(limit = LATEST_REVIEWS_LIMIT): Promise<ReviewView[]> {
    const docs = await Review.find({}).sort({ createdAt: -1 }).limit(limit).lean();
    return docs.map(toReview);
  }

  async remove(id: string): Promise<boolean> {
    if (!mongoose.isValidObjectId(id)) return false;
    const res = await Review.deleteOne({ _id: id });
    if (res.deletedCount) console.log(`Review ${id} deleted`);
    return res.deletedCount === 1;
  }
}

export default ReviewService;
