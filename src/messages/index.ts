export { assembleMessages, lastMessageContent } from './message-assembler.js'
