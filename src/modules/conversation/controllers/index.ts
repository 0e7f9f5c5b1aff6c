export { ConversationController } from './conversation.controller';
export type {
  ConversationControllerDependencies,
  TurnOptions,
} from './conversation.controller';
