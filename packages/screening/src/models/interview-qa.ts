export const InterviewQuestionsCount = 10;

export interface QAPair {
  question: string;
  answer: string;
}
