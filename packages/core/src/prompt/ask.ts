/**
 * Prompt Collaborators
 *
 * The questions the game asks the player, written against whatever
 * Prompter is in context. Each loops until it gets a usable answer, so
 * nothing malformed ever reaches the tree model.
 */
import type { Operation } from 'effection'
import { normalizeAnimalName, normalizeQuestionText } from '../tree/create.ts'
import { PrompterContext, type Tone } from './types.ts'

export const YES_NO_HINT = 'Please answer "Yes" or "No".'

/**
 * Print a line through the Prompter in context.
 */
export function* say(message?: string, tone?: Tone): Operation<void> {
  const prompter = yield* PrompterContext.expect()
  yield* prompter.say(message, tone)
}

/**
 * Interpret a yes/no reply: any non-empty prefix of "yes" or "no", in any
 * case, with surrounding whitespace ignored.
 */
export function parseYesNo(reply: string): boolean | undefined {
  const answer = reply.trim().toLowerCase()
  if (!answer) return undefined
  if ('yes'.startsWith(answer)) return true
  if ('no'.startsWith(answer)) return false
  return undefined
}

/**
 * Ask until the player answers yes or no.
 */
export function* askYesNo(question: string): Operation<boolean> {
  const prompter = yield* PrompterContext.expect()
  while (true) {
    const answer = parseYesNo(yield* prompter.ask(question))
    if (answer !== undefined) {
      return answer
    }
    yield* prompter.say(YES_NO_HINT)
  }
}

/**
 * Ask which animal the player had in mind, and have them confirm it.
 *
 * @returns the normalized (trimmed, lower-case) name
 */
export function* askAnimalName(): Operation<string> {
  const prompter = yield* PrompterContext.expect()
  while (true) {
    const animal = normalizeAnimalName(yield* prompter.ask('What animal were you thinking of?'))
    if (!animal) continue
    if (yield* askYesNo(`Your animal was "${animal}"?`)) {
      return animal
    }
  }
}

/**
 * Upper-case the first character. The rest is left alone so proper nouns
 * survive.
 */
export function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1)
}

/**
 * Ask for a statement that is true for `newAnimal` and false for
 * `oldAnimal`, and have the player confirm the phrasing.
 *
 * @returns the question text without its trailing "?"
 */
export function* askDistinguishingQuestion(
  oldAnimal: string,
  newAnimal: string
): Operation<string> {
  const prompter = yield* PrompterContext.expect()

  yield* prompter.say()
  yield* prompter.say(
    `I need to know how to tell the difference between "${newAnimal}" and "${oldAnimal}".`
  )
  while (true) {
    const reply = yield* prompter.ask(
      `What statement would be TRUE for "${newAnimal}" but NOT TRUE for "${oldAnimal}"?`
    )
    const question = capitalize(normalizeQuestionText(reply))
    if (!question) continue

    yield* prompter.say()
    yield* prompter.say(
      `So if I asked you "${question}?", your answer would be true for "${newAnimal}", but false for "${oldAnimal}".`
    )
    if (yield* askYesNo('Is that right?')) {
      return question
    }
  }
}
