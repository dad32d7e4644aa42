export type MessageRole = 'user' | 'system' | 'assistant';

export abstract class MessageBase {
	abstract readonly role: MessageRole;

	constructor(public content: string) {}
}

export class UserMessage extends MessageBase {
	readonly role = 'user' as const;
}

export class SystemMessage extends MessageBase {
	readonly role = 'system' as const;
}

export class AssistantMessage extends MessageBase {
	readonly role = 'assistant' as const;
}

export type Message = UserMessage | SystemMessage | AssistantMessage;
