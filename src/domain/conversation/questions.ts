/**
 * Scripted questions asked at the start of every daily check-in, in order.
 * The first entry is the greeting's question.
 */
export const DEFAULT_QUESTIONS: readonly string[] = [
  'How are you feeling today?',
  'How would you rate your overall mood today on a scale of 1-10?',
  'Have you had any thoughts of self-harm or suicide?',
  'Have you been taking your medicine on time?',
];

export function firstName(fullName: string): string {
  const first = fullName.trim().split(/\s+/)[0];
  return first || 'there';
}

export function greeting(fullName: string, question: string): string {
  return `👋 Hey, ${firstName(fullName)}! It's time for your daily check-in. ${question}`;
}

/**
 * Text of bank question `index` for a patient: index 0 is wrapped in the
 * personal greeting.
 */
export function bankQuestion(questions: readonly string[], index: number, patientName: string): string | null {
  const question = questions[index];
  if (question === undefined) return null;
  return index === 0 ? greeting(patientName, question) : question;
}
