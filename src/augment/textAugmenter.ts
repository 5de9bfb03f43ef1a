import { DraftContext } from '../industries/base';

export interface TextAugmenter {
  /** Recorded as the author of stored drafts. */
  readonly name: string;
  draft(context: DraftContext): Promise<string>;
}

export const buildOutreachPrompt = (context: DraftContext): string => {
  const about = [context.leadDescription, context.leadLocation].filter(Boolean).join(' - ');
  return [
    `Write a short, personalised first-contact email in ${context.language} to "${context.leadName}", a company in the ${context.industry} sector.`,
    about ? `What we know about them: ${about}` : '',
    '',
    'Our offer:',
    `- Products: ${context.products.join(', ')}`,
    `- Services: ${context.services.join(', ')}`,
    `- Audience: ${context.targetAudience}`,
    `- Value proposition: ${context.valueProposition}`,
    '',
    `Tone: ${context.tone}. Mention at least one concrete ${context.industry} product, offer something useful right away and end with one clear call to action.`,
    'Maximum 150 words. Return only the email body.',
  ]
    .filter((line, index, lines) => line !== '' || (index > 0 && lines[index - 1] !== ''))
    .join('\n');
};
