export { BroadcastHub, type BroadcastHubOptions, type HubListener } from './broadcastHub';
export { ChatService, type AddMessageResult, type ChatServiceDeps } from './chatService';
export { EventSubscription, type SubscriptionOptions, type SubscriptionState } from './eventSubscription';
export { ListenerChannel } from './listenerChannel';
export { createMessageSchema, DEFAULT_MESSAGE_LIMITS, parseSubmittedMessage, type MessageLimits } from './message.validation';
export { SqliteMessageStore, type MessageStore } from './messageStore';
export { Sequencer, type Clock, type SequenceAssignment, type SequencerState } from './sequencer';
export { toWireMessage, type ChatMessage, type InsertOutcome, type SubmittedMessage, type WireMessage } from './types';
export { WriteQueue } from './writeQueue';
