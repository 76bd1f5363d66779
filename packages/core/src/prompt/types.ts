import { createContext, type Operation } from 'effection'

/**
 * How a line of output should be presented. Terminals map tones to colours.
 */
export type Tone = 'plain' | 'success' | 'failure' | 'farewell'

/**
 * The line-oriented console the game talks through.
 */
export interface Prompter {
  /**
   * Show `prompt` followed by a space and return the next line the player
   * enters, unmodified.
   *
   * @throws InterruptedError when the player interrupts or input ends
   */
  ask(prompt: string): Operation<string>

  /** Print one line. Omit `message` for a blank line. */
  say(message?: string, tone?: Tone): Operation<void>
}

export const PrompterContext = createContext<Prompter>('zoo.prompter')
