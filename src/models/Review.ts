import mongoose, { Schema } from 'mongoose';

export interface IReview {
  authorChatId: number;
  authorName?: string;
  text: string;
  createdAt: Date;
}

const reviewSchema = new Schema<IReview>({
  authorChatId: { type: Number, required: true },
  authorName: { type: String, trim: true },
  text: { type: String, required: true, trim: true },
  createdAt: { type: Date, default: Date.now },
}, {
  collection: 'Reviews'
});

reviewSchema.index({ createdAt: -1 });

export const Review: mongoose.Model<IReview> = (mongoose.models && mongoose.models.Review)
  ? mongoose.models.Review as mongoose.Model<IReview>
  : mongoose.model<IReview>('Review', reviewSchema);

export default Review;
