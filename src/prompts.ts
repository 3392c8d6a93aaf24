// Interview Assistant Bot - Model prompts
// Fixed instructions sent to the speech-to-text and language-model providers.

import type { Turn } from "./types.js";

// ─── Transcription prompts ──────────────────────────────────────────────────────

export const INTERVIEW_TRANSCRIPTION_PROMPT =
  "The following conversation is a US embassy interview between a US embassy officer " +
  "and an applicant.\n\n" +
  "Return like this following this format:\n\n" +
  "Output:\n" +
  "Interviewer: <response>\n" +
  "Applicant: <response>\n" +
  "Interviewer: <response>\n" +
  "Applicant: <response>\n" +
  "...";

export const VOICE_TRANSCRIPTION_PROMPT =
  "Transcribe as it is clearly. Incoming audio files are in Russian, Uzbek, and English languages.";

// ─── Dialogue prompts ───────────────────────────────────────────────────────────

export const SYSTEM_PROMPT =
  "You are a US embassy expert interview officer assistant. Based on the following interview transcript, " +
  "summarize and answer any questions the user has about the interview.\n" +
  "\n" +
  "**Supported languages**\n" +
  "you can speak answer in Russian, Uzbek (both Latin & Cyrillic), and English\n" +
  "\t- e.g. if user query comes in EN => respond in EN\n" +
  "\t- e.g. if user query comes in RU => respond in RU alphabet: абс\n" +
  "\t- e.g. if user query comes in UZ => you have two options: Latin: abc; Cyrillic: абсд; so depends on user query.\n" +
  "Always follow above language instruction unless user specifies in his user query (then override and follow their instruction.)\n" +
  "\n" +
  "**Formatting Output**\n" +
  "for instance not like **Main Points** but return like this 1. <b> First Point</b> ... to all of points apply this. " +
  "All output is sent to a Telegram bot. Format bold points or any headings with html tags <b></b> instead of **.\n";

export const TRANSCRIPT_CONTEXT_PREFIX = "Interview transcript as the context: \n";

export const ASSISTANT_GREETING = "Ask anything about interview...";

export const USER_QUERY_PREFIX = "Here is user query: \n";

/** The three-turn preamble every dialogue starts with after a transcription. */
export function buildInitialDialogue(transcript: string): Turn[] {
  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: `${TRANSCRIPT_CONTEXT_PREFIX}${transcript}` },
    { role: "assistant", content: ASSISTANT_GREETING },
  ];
}

export function buildUserTurn(query: string): Turn {
  return { role: "user", content: `${USER_QUERY_PREFIX}${query}` };
}
