import type { ConversationMessage, IntentDetectionResult, MessageRole } from "../../../shared/schemas/intent";

const ROLE_LABELS: Record<MessageRole, string> = {
  user: "User",
  assistant: "Assistant",
  system: "System",
};

/** Last `windowSize` turns, oldest first, one `Role: content` line each. */
export function formatConversationWindow(messages: ConversationMessage[], windowSize: number): string {
  if (windowSize <= 0) return "";
  return [...messages]
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
    .slice(-windowSize)
    .map(message => `${ROLE_LABELS[message.role]}: ${message.content}`)
    .join("\n");
}

function contextSection(conversation: string): string {
  return conversation ? `Conversation so far:\n${conversation}\n\n` : "";
}

export function buildAlternativeIntentsPrompt(
  query: string,
  original: IntentDetectionResult,
  conversation: string
): string {
  return `${contextSection(conversation)}You are an intent classification assistant. A user's message was classified with low confidence. Suggest other intents the user may have meant.

User message: "${query}"

Initial classification:
- Intent: ${original.intent}
- Confidence: ${original.confidence.toFixed(2)}
- Explanation: ${original.explanation ?? "none"}

Return ONLY a JSON array, no markdown or extra text. Each element:
{"intent": "<intent_name>", "confidence": <0.0-1.0>, "explanation": "<why this intent fits>"}`;
}

export function buildClarificationQuestionsPrompt(
  query: string,
  alternatives: IntentDetectionResult[],
  questionCount: number
): string {
  const options = alternatives
    .map(
      (alternative, index) =>
        `${index + 1}. ${alternative.intent} (confidence ${alternative.confidence.toFixed(2)})${
          alternative.explanation ? `: ${alternative.explanation}` : ""
        }`
    )
    .join("\n");

  return `You help a chatbot work out what a user wants. Their message could mean several things.

User message: "${query}"

Candidate intents:
${options}

Write ${questionCount} short, friendly question(s) that would tell these intents apart. Avoid technical wording.

Return ONLY a JSON array of strings, no markdown or extra text. Example: ["<question 1>", "<question 2>"]`;
}

export function buildGeneralizedIntentPrompt(query: string, conversation: string): string {
  return `${contextSection(conversation)}You are an intent classification assistant. The message below did not match any known intent. Classify it into a broad category instead of a specific intent.

User message: "${query}"

Return ONLY a JSON object, no markdown or extra text:
{"intent": "<broad_category>", "confidence": <0.0-1.0>, "explanation": "<short reason>", "suggestedNextStep": "<what the system should do next>"}`;
}

export function buildPartialIntentPrompt(query: string, conversation: string): string {
  return `${contextSection(conversation)}You are an intent analysis assistant. The message below is ambiguous. Extract whatever partial intent and entities you can, even if incomplete.

User message: "${query}"

Return ONLY a JSON object, no markdown or extra text:
{"partialIntent": "<what is known about the intent>", "confidence": <0.0-1.0>, "extractedEntities": [{"type": "<entity_type>", "value": "<entity_value>", "confidence": <0.0-1.0>}], "missingInformation": "<what is still needed to understand the request>"}`;
}

export const CHAIN_OF_THOUGHT_SYSTEM_PROMPT = `You are a careful reasoning assistant. Work through the user's request step by step:
1. Parse and restate the request
2. Identify the key entities and how they relate
3. Consider possible approaches
4. Analyze constraints and limitations
5. Plan a multi-step solution
6. Refine and check the plan

Return ONLY a JSON object, no markdown or extra text:
{
  "reasoning": [{"step": 1, "thought": "<thinking for this step>", "conclusion": "<what this step concluded>"}],
  "finalConclusion": "<conclusion after all steps>",
  "confidenceScore": <0.0-1.0>,
  "entities": [{"type": "<entity_type>", "value": "<entity_value>", "importance": <0-10>}],
  "suggestedActions": ["<action>"]
}`;

export function buildVerificationPrompt(draftJson: string): string {
  return `Review this chain-of-thought result for logical consistency, factual accuracy and whether the conclusion follows from the steps:

${draftJson}

Check that the steps connect, that no assumption is wrong and that the conclusion is supported.

Return ONLY a JSON object, no markdown or extra text:
{"isValid": <true|false>, "confidenceScore": <0.0-1.0>, "issues": [{"step": <step_number>, "issue": "<problem>", "correction": "<corrected conclusion for that step>"}], "improvedConclusion": "<better conclusion, if any>"}`;
}

export function buildIntentDetectionPrompt(query: string, contextSummary: string): string {
  const context = contextSummary
    ? `Conversation context:\n${contextSummary}\n\nLatest user query: "${query}"`
    : `User query: "${query}"`;

  return `You are an intent detection assistant. Identify what the user wants and the entities their query mentions.

${context}

Return ONLY a JSON object, no markdown or extra text:
{"intent": "<intent_name>", "confidence": <0.0-1.0>, "explanation": "<short reason>", "entities": [{"type": "<entity_type>", "value": "<entity_value>", "confidence": <0.0-1.0>}]}`;
}

export function buildIntentReviewPrompt(query: string, detection: IntentDetectionResult): string {
  return `Review the following intent classification and correct it if it is wrong.

User query: "${query}"

Classification:
- Intent: ${detection.intent}
- Confidence: ${detection.confidence.toFixed(2)}
- Explanation: ${detection.explanation ?? "none"}

Return ONLY a JSON object, no markdown or extra text:
{"isCorrect": <true|false>, "correctedIntent": "<intent_name>", "confidence": <0.0-1.0>, "explanation": "<short reason>"}`;
}

export function buildHierarchicalIntentPrompt(query: string): string {
  return `You are an intent classification assistant. A message may ask for more than one thing. Name its main intent, then any sub-intents it also contains.

User message: "${query}"

Return ONLY a JSON object, no markdown or extra text:
{"topLevelIntent": {"intent": "<intent_name>", "confidence": <0.0-1.0>, "explanation": "<short reason>"}, "subIntents": [{"intent": "<intent_name>", "confidence": <0.0-1.0>, "explanation": "<short reason>"}]}`;
}
