// Fallback Responder Types
// Deterministic, network-free replies used when the reasoning service cannot answer

export type FallbackCategory =
  | 'QUESTION'   // Interrogative words
  | 'ARITHMETIC' // Math words
  | 'OTHER';     // Anything else

export interface FallbackTrigger {
  phrase: string; // Lower-case, matched by substring containment
  reply: string;
}

export type FallbackDecision =
  | { kind: 'trigger'; trigger: string }
  | { kind: 'category'; category: FallbackCategory };

export interface FallbackResult {
  decision: FallbackDecision;
  reply: string;
}
