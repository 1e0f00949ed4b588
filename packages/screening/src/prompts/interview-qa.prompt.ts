export const interviewQaSystemPrompt = 'You are an experienced recruitment consultant.';

export const interviewQaUserPrompt = `
You are an AI consultant in recruitment. Generate {{questionsCount}} concise technical interview questions with model answers based on the information provided.

### Job Description:
{{jobDescription}}

### Candidate Resume:
{{resumeText}}

Instructions:
- The questions should target the essential technical areas from the job description.
- Answers should be short and informative.

Return a JSON object with the structure:
{
  "questions": [
    { "question": "Question 1", "answer": "Answer 1" }
  ]
}
`;
