export {
  FeedbackService,
  MAX_FEEDBACK_LENGTH,
  type FeedbackServiceOptions,
  type FeedbackReceipt,
} from './feedback-service';
