export interface ChatInvokeUsage {
	prompt_tokens: number;
	completion_tokens: number;
	total_tokens: number;
}

export class ChatInvokeCompletion<T = string> {
	constructor(
		public completion: T,
		public usage: ChatInvokeUsage | null = null,
	) {}
}
