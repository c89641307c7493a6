/**
 * Judge Prompts
 *
 * The judge reads the full transcript and answers with a single JSON object.
 */

import type { Turn } from '../../../types/debate.js';

export const JUDGE_SYSTEM_PROMPT = `You are an impartial debate judge. You evaluate arguments on their reasoning, use of evidence, relevance to the topic and engagement with opposing points. You do not reward length or rhetoric for its own sake.

Respond with ONLY a JSON object, no prose before or after it.`;

/**
 * Render the transcript grouped by round
 */
export function formatTranscript(turns: readonly Turn[]): string {
  if (turns.length === 0) {
    return '(no accepted arguments)';
  }

  const rounds = new Map<number, Turn[]>();
  for (const turn of turns) {
    const round = rounds.get(turn.roundNumber) ?? [];
    round.push(turn);
    rounds.set(turn.roundNumber, round);
  }

  return [...rounds.entries()]
    .map(([roundNumber, roundTurns]) => {
      const lines = roundTurns.map((turn) => `[${turn.agentId}]: ${turn.argumentText}`);
      return `ROUND ${roundNumber + 1}\n${lines.join('\n\n')}`;
    })
    .join('\n\n');
}

/**
 * User prompt asking for the verdict JSON
 */
export function buildJudgePrompt(topic: string, participants: readonly string[], turns: readonly Turn[]): string {
  const roundCount = new Set(turns.map((turn) => turn.roundNumber)).size;
  const exampleScores = participants.map((id) => `"${id}": 7.5`).join(', ');
  const exampleRounds = participants
    .map((id) => `"${id}": [${Array.from({ length: Math.max(roundCount, 1) }, () => '7').join(', ')}]`)
    .join(', ');

  return `DEBATE TOPIC: ${topic}
PARTICIPANTS: ${participants.join(', ')}

TRANSCRIPT:
${formatTranscript(turns)}

Score every participant from 0 to 10 and pick exactly one winner.

Return JSON in exactly this shape:
{
  "winner": "<one of: ${participants.join(', ')}>",
  "summary": "<two or three sentences recapping the debate>",
  "rationale": "<why the winner won>",
  "scores": { ${exampleScores} },
  "roundScores": { ${exampleRounds} }
}

Every participant must have a numeric score. Use the participant ids exactly as written above.`;
}
