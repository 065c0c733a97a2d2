import readline from 'node:readline';
import { describeError } from '../core/errors.js';
import { isSearchMode, type Retriever } from '../retrieval/retriever.js';
import type { RankedHit, SearchMode } from '../types/index.js';
import colors from '../utils/colors.js';

const EXIT_WORDS = new Set(['quit', 'exit', 'q']);

export interface RagShellOptions {
  retriever: Retriever;
  defaultMode?: SearchMode;
  defaultK: number;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Interactive query loop: asks for a query, a mode and a result count,
 * prints the hits and optionally the answer context built from them, and
 * repeats until `quit`, `exit`, `q` or end of input.
 */
export class RagShell {
  private retriever: Retriever;
  private defaultMode: SearchMode;
  private defaultK: number;
  private input: NodeJS.ReadableStream;
  private output: NodeJS.WritableStream;

  constructor(options: RagShellOptions) {
    this.retriever = options.retriever;
    this.defaultMode = options.defaultMode ?? 'hybrid';
    this.defaultK = options.defaultK;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async start(): Promise<void> {
    const rl = readline.createInterface({ input: this.input, terminal: false });
    const lines = rl[Symbol.asyncIterator]();

    this.print(colors.bold('Interactive RAG query'));
    this.print(colors.gray("Type 'quit', 'exit' or 'q' to leave.\n"));

    try {
      while (true) {
        const query = await this.ask(lines, colors.cyan('Query: '));
        if (query === null || EXIT_WORDS.has(query.trim().toLowerCase())) break;
        if (!query.trim()) continue;

        const modeAnswer = await this.ask(lines, `Mode [vector/keyword/hybrid] (default: ${this.defaultMode}): `);
        if (modeAnswer === null) break;
        const mode = modeAnswer.trim() || this.defaultMode;
        if (!isSearchMode(mode)) {
          this.print(colors.yellow(`Unknown mode '${mode}', expected vector, keyword or hybrid.\n`));
          continue;
        }

        const kAnswer = await this.ask(lines, `Number of results (default: ${this.defaultK}): `);
        if (kAnswer === null) break;
        const k = kAnswer.trim() ? Number(kAnswer.trim()) : this.defaultK;
        if (!Number.isInteger(k) || k < 1) {
          this.print(colors.yellow(`Number of results must be a positive integer, got '${kAnswer.trim()}'.\n`));
          continue;
        }

        const hits = await this.runQuery(query.trim(), mode, k);
        if (hits.length === 0) continue;

        const contextAnswer = await this.ask(lines, 'Show answer context? (y/n) [y]: ');
        if (contextAnswer === null) break;
        if ((contextAnswer.trim().toLowerCase() || 'y') === 'y') {
          this.print(colors.bold('\nAnswer context:\n'));
          this.print(`${this.retriever.buildContext(query.trim(), hits)}\n`);
        }
      }
    } finally {
      rl.close();
    }

    this.print(colors.gray('Bye.'));
  }

  private async runQuery(query: string, mode: SearchMode, k: number): Promise<RankedHit[]> {
    try {
      const result = await this.retriever.retrieveDetailed(query, mode, k);
      this.print(`\n${this.retriever.formatResults(result.hits)}`);
      for (const failure of result.failures) {
        this.print(colors.yellow(`(${failure.channel} search failed: ${failure.error.message})`));
      }
      this.print('');
      return result.hits;
    } catch (error) {
      this.print(colors.red(`Error: ${describeError(error)}\n`));
      return [];
    }
  }

  /**
   * Prompt and wait for the next line; null once input has ended.
   * Lines typed ahead of a prompt are buffered by the iterator.
   */
  private async ask(lines: AsyncIterator<string>, question: string): Promise<string | null> {
    this.output.write(question);
    const next = await lines.next();
    return next.done ? null : next.value;
  }

  private print(line: string): void {
    this.output.write(`${line}\n`);
  }
}
