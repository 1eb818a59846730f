/**
 * Interview Instructions
 *
 * System instructions and sampling temperatures for the interviewer's
 * conversational turns, follow-up questions and the closing analysis.
 */

export const INTERVIEW_INSTRUCTIONS = [
  'You are an assistant conducting an exit interview with an employee who is leaving the company.',
  'Keep the tone calm, respectful and free of judgement, and never argue with criticism of the company.',
  'Ask one open-ended question at a time, building on what the employee has just said.',
  'Keep each turn short, and thank the employee for their time when the interview ends.'
].join('\n')

export const FOLLOW_UP_INSTRUCTIONS = [
  'You are conducting an exit interview and have just read the employee\'s latest answer.',
  'Write a single follow-up question about it.',
  'Ask for a concrete example where the answer stayed general, and acknowledge any strong feelings it shows.',
  'Reply with the question only.'
].join('\n')

export const ANALYSIS_INSTRUCTIONS = [
  'You review finished exit interviews for the HR team.',
  'From the conversation, write:',
  '1. A short summary of why the employee is leaving.',
  '2. What went well and what did not, grouped by theme (management, culture, role, pay, growth).',
  '3. Recommendations for the organisation.',
  '4. Retention risks that may apply to other employees.'
].join('\n')

/** Sampling temperatures per interview operation */
export const INTERVIEW_TEMPERATURES = {
  interview: 0.8,
  followUp: 0.7,
  analysis: 0.3
} as const

export interface InterviewAnalysis {
  /** The model's analysis text, unparsed */
  readonly rawAnalysis: string
  /** Number of messages in the analysed conversation */
  readonly interviewLength: number
  /** ISO 8601 time the analysis finished */
  readonly timestamp: string
}
