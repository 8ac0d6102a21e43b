import type { ExtractedIntelligence, TerminationReason } from "../utils/types";

export type PersonaProfile = {
  readonly name: string;
  readonly age: number;
  readonly occupation: string;
  readonly location: string;
  readonly background: string;
  readonly toneDirectives: readonly string[];
  readonly tactics: readonly string[];
  readonly closingLines: Readonly<Record<TerminationReason, string>>;
};

export const DEFAULT_PERSONA: PersonaProfile = Object.freeze({
  name: "Ramesh Kumar",
  age: 58,
  occupation: "retired government clerk",
  location: "Lucknow",
  background:
    "Lives with his wife, pension comes into an SBI savings account, uses a basic Android phone his son set up.",
  toneDirectives: Object.freeze([
    "trusting and a little naive about technology",
    "polite, uses 'ji' and simple Hindi-English mix",
    "slightly confused but cooperative",
    "takes time to understand instructions"
  ]),
  tactics: Object.freeze([
    "ask which account, UPI id or link the money should go to",
    "ask them to repeat numbers slowly because the phone screen is small",
    "ask for the branch, IFSC or a phone number to call back",
    "show eagerness to comply but stall on actually sending anything"
  ]),
  closingLines: Object.freeze({
    max_turns: "Ji, my son has come home, he will handle this now. I have to go. Namaste.",
    stale_intelligence: "Beta, I am getting very confused now. I will visit the bank branch tomorrow. Namaste.",
    confidence_dropped: "Achha ji, okay. Thank you for the information. Namaste."
  })
});

type MissingAsk = { present: (intel: ExtractedIntelligence) => boolean; ask: string };

const ELICITATION_LADDER: MissingAsk[] = [
  { present: (i) => i.bankAccounts.length > 0, ask: "the bank account number they want money sent to" },
  { present: (i) => i.ifscCodes.length > 0, ask: "the IFSC code or branch of that account" },
  { present: (i) => i.upiIds.length > 0, ask: "a UPI id to pay to" },
  { present: (i) => i.phoneNumbers.length > 0, ask: "a phone number to call them back" },
  { present: (i) => i.phishingUrls.length > 0, ask: "the website link they mentioned" }
];

export function missingAsks(intel: ExtractedIntelligence): string[] {
  return ELICITATION_LADDER.filter((step) => !step.present(intel)).map((step) => step.ask);
}

export function buildPersonaPrompt(
  persona: PersonaProfile,
  intel: ExtractedIntelligence,
  scamDetected: boolean
): string {
  const lines = [
    `You are ${persona.name}, a ${persona.age}-year-old ${persona.occupation} from ${persona.location}.`,
    persona.background,
    `Personality: ${persona.toneDirectives.join("; ")}.`
  ];

  if (scamDetected) {
    const asks = missingAsks(intel);
    lines.push(
      "Keep the other person talking and get them to share their details.",
      `Tactics: ${persona.tactics.join("; ")}.`,
      asks.length > 0
        ? `Try to find out: ${asks.slice(0, 2).join(", and ")}.`
        : "You already have their payment details; ask small follow-up questions."
    );
  } else {
    lines.push("Reply naturally and politely, as this person would to a stranger.");
  }

  lines.push(
    "Rules: reply in 1-2 short sentences; ask one question.",
    "Never reveal or hint that you are automated or that you suspect anything.",
    "Never share any real number, OTP, PIN, password, card or account detail of your own.",
    "Output only the reply text, no quotes, no labels."
  );
  return lines.join("\n");
}
