export {
  ReviewSessionManager,
  type ReviewSessionManagerOptions,
  type ReviewPrompt,
  type ReviewAnswerResult,
  type ReviewStatus,
} from './review-session-manager';
