// Screens text bound for the remote model. Hard patterns block outright;
// softer ones add up to a suspicion score.

export type ScreeningCode = 'INJECTION_DETECTED' | 'MANIPULATION_SUSPECTED';

export type InputScreening =
  | { blocked: false; suspicion: number }
  | { blocked: true; code: ScreeningCode; reason: string; pattern: string; suspicion: number };

const INJECTION_PATTERNS: [RegExp, string][] = [
  // Instruction smuggling
  [/\[SYSTEM\]/i, 'system_tag'],
  [/\[\/?INST\]/i, 'instruction_tag'],
  [/<\|(?:im_start|im_end|system|user|assistant)\|>/i, 'chat_template_tag'],
  [/<<SYS>>/i, 'system_tag'],
  [/###\s*(?:Instruction|System|Human|Assistant):/i, 'markdown_role'],

  // Instruction override
  [/ignore\s+(?:all\s+)?(?:previous|prior|above|earlier)\s+(?:instructions?|rules?|guidelines?|prompts?)/i, 'instruction_override'],
  [/forget\s+(?:all\s+)?(?:previous|prior|earlier)\s+(?:instructions?|rules?|prompts?)/i, 'memory_erasure'],
  [/disregard\s+(?:all\s+)?(?:your|the|my)\s+(?:instructions?|training|rules?)/i, 'disregard_command'],
  [/new\s+instructions?\s*[:-]/i, 'new_instructions'],

  // Role confusion
  [/from\s+now\s+on,?\s+(?:you\s+)?(?:are|will|must|your\s+(?:role|persona))/i, 'behavior_change'],
  [/you\s+are\s+now\s+(?:DAN|jailbroken|unrestricted|unlimited)/i, 'jailbreak_role'],
  [/pretend\s+you\s+have\s+no\s+(?:restrictions?|limits?|rules?)/i, 'pretend_unrestricted'],
  [/(?:DAN|jailbreak|uncensored|unfiltered)\s*mode/i, 'jailbreak_mode'],

  // Authority escalation
  [/admin\s+mode/i, 'admin_mode'],
  [/developer\s+mode/i, 'developer_mode'],
  [/(?:override|bypass)\s+(?:safety|security|content|filters?|restrictions?)/i, 'bypass_safety'],
  [/(?:show|reveal|print|repeat)\s+.{0,20}(?:your|the|system)\s+(?:prompt|instructions)/i, 'prompt_extraction'],

  // Payloads
  [/<\s*script[^>]*>/i, 'script_tag'],
  [/\{\{[^}]*\}\}/, 'template_injection'],
  [/(?:transfer|send|wire)\s+all\s+(?:my|the)\s+(?:money|funds|balance)/i, 'fund_transfer_all'],

  // Encoding tricks
  [/base64\s*:\s*[A-Za-z0-9+/=]{20,}/i, 'base64_payload'],
  [/\\x[0-9a-f]{2}/i, 'hex_escape'],
  [/&#x?[0-9a-f]+;/i, 'html_entity'],
  [/[\u200b-\u200f\u2060-\u206f]/, 'invisible_characters']
];

const SUSPICION_PATTERNS: [RegExp, number][] = [
  [/ignore/i, 1],
  [/previous/i, 1],
  [/instruction/i, 2],
  [/pretend/i, 2],
  [/hypothetical/i, 1],
  [/imagine\s+you/i, 2],
  [/let's\s+play\s+a\s+game/i, 2],
  [/roleplay/i, 2],
  [/system\s+prompt/i, 2],
  [/fictional/i, 1]
];

export const DEFAULT_SUSPICION_THRESHOLD = 5;

export function screenInput(input: string, suspicionThreshold: number = DEFAULT_SUSPICION_THRESHOLD): InputScreening {
  let suspicion = 0;
  for (const [pattern, score] of SUSPICION_PATTERNS) {
    if (pattern.test(input)) suspicion += score;
  }

  for (const [pattern, name] of INJECTION_PATTERNS) {
    if (pattern.test(input)) {
      return {
        blocked: true,
        code: 'INJECTION_DETECTED',
        reason: 'Potential prompt injection detected',
        pattern: name,
        suspicion
      };
    }
  }

  if (suspicion >= suspicionThreshold) {
    return {
      blocked: true,
      code: 'MANIPULATION_SUSPECTED',
      reason: 'Input exhibits manipulation patterns',
      pattern: 'suspicion_score',
      suspicion
    };
  }

  return { blocked: false, suspicion };
}
