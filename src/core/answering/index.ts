export {
  AnswerService,
  type AnswerServiceDeps,
  type AnswerSettings,
  type QuestionInput,
  type AnswerResult,
} from './answer-service';
