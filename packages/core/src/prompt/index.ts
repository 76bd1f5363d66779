export { PrompterContext, type Prompter, type Tone } from './types.ts'
export {
  askAnimalName,
  askDistinguishingQuestion,
  askYesNo,
  capitalize,
  parseYesNo,
  say,
  YES_NO_HINT,
} from './ask.ts'
