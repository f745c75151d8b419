/**
 * Prompt templates for every generation call site.
 *
 * Templates use `{name}` placeholders filled by renderTemplate(). Each template
 * is paired with the system message sent alongside it.
 */

export interface PromptTemplate {
  system: string;
  template: string;
}

export interface PromptTemplates {
  /** Placeholders: {title}, {description}, {features} */
  summary: PromptTemplate;
  /** Placeholders: {title}, {description}, {features} */
  tagline: PromptTemplate;
  /** Placeholders: {products}, {count} */
  criteria: PromptTemplate;
  /** Placeholders: {criterion}, {products} */
  verdict: PromptTemplate;
}

export const NO_DESCRIPTION_PLACEHOLDER = 'No description provided.';
export const NO_FEATURES_PLACEHOLDER = 'No features provided.';

export const DEFAULT_PROMPTS: PromptTemplates = {
  summary: {
    system:
      'You are a marketing specialist who writes concise, persuasive product copy for an e-commerce website.',
    template: `Summarize the following product for a marketing website in 2-3 sentences.

Description:
{description}

Features:
{features}`,
  },

  tagline: {
    system:
      'You are a creative copywriter who writes catchy taglines and scannable product highlights for an e-commerce website.',
    template: `Create a catchy one-line tagline for {title} and a short list of its key highlights.

Description:
{description}

Features:
{features}

IMPORTANT: Please format your response with:
1. Tagline: followed by a catchy tagline that incorporates the product title
2. Highlights: A bulleted list of highlights using '-' at the start of each bullet point.`,
  },

  criteria: {
    system: 'You are a product analyst who designs fair, specific comparison criteria for shoppers.',
    template: `Here are three products a shopper is choosing between:

{products}

Write exactly {count} questions that would help a shopper decide between these products, for example "Which product offers the best battery life?".
Output one question per line, with no numbering, bullets or extra text.`,
  },

  verdict: {
    system: 'You are an impartial product reviewer who judges products against a single criterion.',
    template: `Criterion: {criterion}

{products}

Which product best satisfies the criterion? Start your answer by naming the winner exactly as "Product 1", "Product 2" or "Product 3", then explain why in 2-3 sentences.`,
  },
};
