import type { ChatInvokeCompletion } from './views.js';
import type { Message } from './messages.js';

export interface ChatInvokeOptions {
	signal?: AbortSignal;
	/** Ask the provider to constrain the reply to a single JSON value. */
	jsonMode?: boolean;
}

export interface BaseChatModel {
	model: string;

	get provider(): string;
	get name(): string;

	ainvoke(messages: Message[], options?: ChatInvokeOptions): Promise<ChatInvokeCompletion<string>>;
}
