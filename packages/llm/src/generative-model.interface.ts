export interface IGenerativeModel {
  readonly name: string;
  /** Single-turn, non-streaming completion. Rejects on transport or provider failure. */
  generate(prompt: string): Promise<string>;
}
