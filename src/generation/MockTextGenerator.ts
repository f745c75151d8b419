import type { TextGenerator } from './TextGenerator.js';
import { DEFAULT_PROMPTS, type PromptTemplates } from './prompts.js';

const MOCK_SUMMARY =
  'A dependable choice that balances everyday performance with solid value. ' +
  'Its standout features make it easy to recommend for most shoppers.';

const MOCK_TAGLINE_RESPONSE = [
  'Tagline: Built for the way you actually use it',
  'Highlights:',
  '- Reliable everyday performance',
  '- Thoughtful design details',
  '- Strong value for the price',
].join('\n');

const MOCK_CRITERIA = [
  'Which product offers the best overall performance?',
  'Which product provides the best value for its price?',
  'Which product has the most useful feature set?',
  'Which product is best built for long-term durability?',
  'Which product is easiest to use day to day?',
];

/**
 * Deterministic generator used for `useMock` runs and local development.
 *
 * The prompt kind is recognised from the system message, so responses come back
 * in the shape each parser expects. Verdict winners are derived from the
 * criterion text, so the same input always produces the same comparison.
 */
export class MockTextGenerator implements TextGenerator {
  private readonly prompts: PromptTemplates;

  constructor(prompts: PromptTemplates = DEFAULT_PROMPTS) {
    this.prompts = prompts;
  }

  async generate(prompt: string, systemMessage: string): Promise<string> {
    switch (systemMessage) {
      case this.prompts.summary.system:
        return MOCK_SUMMARY;
      case this.prompts.tagline.system:
        return MOCK_TAGLINE_RESPONSE;
      case this.prompts.criteria.system:
        return MOCK_CRITERIA.join('\n');
      case this.prompts.verdict.system:
        return mockVerdict(prompt);
      default:
        return MOCK_SUMMARY;
    }
  }
}

function mockVerdict(prompt: string): string {
  const criterionLine = prompt.split('\n').find((line) => line.startsWith('Criterion:')) ?? prompt;
  let sum = 0;
  for (const char of criterionLine) {
    sum += char.charCodeAt(0);
  }
  const slot = (sum % 3) + 1;
  return (
    `Product ${slot} is the strongest answer to this criterion. ` +
    'Its description and feature list address the question more directly than the alternatives.'
  );
}
