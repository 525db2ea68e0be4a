import type { Choice, InputValidator, Prompter } from '../prompts.js'

export type Answer = string | boolean

/**
 * Prompter answering from a message-keyed table. An unanswered question
 * fails the test; validators run against the scripted answer.
 */
export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = []
  readonly notes: string[] = []

  constructor (private readonly answers: Record<string, Answer>) {}

  async input (message: string, options: { default?: string, validate?: InputValidator } = {}): Promise<string> {
    const answer = this.text(message)
    const value = answer === '' && options.default !== undefined ? options.default : answer
    this.check(message, value, options.validate)
    return value
  }

  async secret (message: string, options: { validate?: InputValidator } = {}): Promise<string> {
    const value = this.text(message)
    this.check(message, value, options.validate)
    return value
  }

  async confirm (message: string, _defaultValue: boolean): Promise<boolean> {
    const answer = this.answer(message)
    if (typeof answer !== 'boolean') {
      throw new Error(`Expected a boolean answer for: ${message}`)
    }
    return answer
  }

  async select<T extends string> (message: string, choices: ReadonlyArray<Choice<T>>, _defaultValue?: T): Promise<T> {
    const answer = this.answer(message)
    const choice = choices.find(c => c.value === answer)
    if (!choice) {
      throw new Error(`Answer ${String(answer)} is not a choice for: ${message}`)
    }
    return choice.value
  }

  note (message: string): void {
    this.notes.push(message)
  }

  private answer (message: string): Answer {
    this.asked.push(message)
    const answer = this.answers[message]
    if (answer === undefined) {
      throw new Error(`Unexpected prompt: ${message}`)
    }
    return answer
  }

  private text (message: string): string {
    const answer = this.answer(message)
    if (typeof answer !== 'string') {
      throw new Error(`Expected a text answer for: ${message}`)
    }
    return answer
  }

  private check (message: string, value: string, validate?: InputValidator): void {
    const verdict = validate ? validate(value) : true
    if (verdict !== true) {
      throw new Error(`Invalid answer for ${message}: ${verdict}`)
    }
  }
}
