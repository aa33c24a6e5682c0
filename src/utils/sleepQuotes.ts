import { readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const defaultQuotesPath = join(__dirname, '../../data/sleep_quotes.json');

export type QuoteKind = 'supportive' | 'urgent';

const quotesSchema = z.object({
  supportive: z.array(z.string().min(1)).min(1),
  urgent: z.array(z.string().min(1)).min(1),
});

export type QuoteCatalogue = z.infer<typeof quotesSchema>;

export class SleepQuotes {
  constructor(
    private readonly catalogue: QuoteCatalogue,
    private readonly random: () => number = Math.random
  ) {}

  /** Pick a reminder line; without `kind` both tones are in the draw. */
  randomQuote(kind?: QuoteKind): string {
    const pool = kind
      ? this.catalogue[kind]
      : [...this.catalogue.supportive, ...this.catalogue.urgent];
    const index = Math.min(Math.floor(this.random() * pool.length), pool.length - 1);
    return pool[index] ?? pool[0] ?? '';
  }

  get count(): number {
    return this.catalogue.supportive.length + this.catalogue.urgent.length;
  }
}

export async function loadSleepQuotes(
  filePath: string = defaultQuotesPath,
  random?: () => number
): Promise<SleepQuotes> {
  const raw: unknown = JSON.parse(await readFile(filePath, 'utf8'));
  return new SleepQuotes(quotesSchema.parse(raw), random);
}
