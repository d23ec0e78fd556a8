export {
  QUIZ_UNAVAILABLE,
  QuizSessionManager,
  generateQuizToken,
  type QuizSessionManagerOptions,
  type QuizReveal,
} from './quiz-session-manager';
