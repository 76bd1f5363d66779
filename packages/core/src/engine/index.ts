export { BANNER, runGame } from './game.ts'
export { learn, playRound, traverse, type RoundOutcome } from './play.ts'
export { teach, type Lesson, type TeachResult } from './teach.ts'
