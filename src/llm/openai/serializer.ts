import type { ChatCompletionMessageParam } from 'openai/resources/index.mjs';
import type { Message } from '../messages.js';

export class OpenAIMessageSerializer {
  serialize(messages: Message[]): ChatCompletionMessageParam[] {
    return messages.map((message) => this.serializeMessage(message));
  }

  private serializeMessage(message: Message): ChatCompletionMessageParam {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
    }
  }
}
