// Orchestrator prompt templates
// Placeholders: {user_input} {num_agents} for decomposition, {num_responses} {agent_responses} for synthesis.

export const QUESTION_GENERATION_PROMPT = `You split a user request into {num_agents} tasks that separate agents will carry out in parallel.

User request: {user_input}

Write {num_agents} distinct tasks. Each task must:
1. Be something an agent can actually complete on its own
2. Cover a different part of the request
3. Be specific and concrete

For code requests, split by implementation area. For writing requests, split by section or angle. For research requests, split by the information each agent should gather.

Reply with a JSON array of exactly {num_agents} strings and nothing else, for example:
["task 1", "task 2", "task 3", "task 4"]`;

export const SYNTHESIS_PROMPT = `{num_responses} agents each completed part of the same request. Their outputs follow.

{agent_responses}
Combine their work into one complete result:
1. Merge the actual content, code or findings from every output
2. For code, produce one complete working file
3. For text, produce one coherent piece
4. Fill gaps between the outputs and remove repetition

Do not call any tools. Do not mention the agents or how the result was combined. Reply with the final result only.`;

export const FALLBACK_QUESTION_TEMPLATES: readonly string[] = [
  'What are the most important facts and background about {topic}?',
  'What do recent developments and current evidence show about {topic}?',
  'What alternative perspectives or counterarguments exist about {topic}?',
  'What practical implications and next steps follow from {topic}?',
];
