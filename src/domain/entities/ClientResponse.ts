/**
 * Response envelope returned by every public client operation
 */

export type ResponseMessage =
  | { readonly kind: 'info'; readonly text: string }
  | { readonly kind: 'error'; readonly text: string };

export interface ClientResponse<T> {
  readonly success: boolean;
  readonly result: T;
  readonly messages: readonly ResponseMessage[];
}

export function info(text: string): ResponseMessage {
  return { kind: 'info', text };
}

export function error(text: string): ResponseMessage {
  return { kind: 'error', text };
}

export function respond<T>(success: boolean, result: T, messages: readonly ResponseMessage[] = []): ClientResponse<T> {
  return Object.freeze({ success, result, messages: Object.freeze([...messages]) });
}

/**
 * Feeds one response into the next: messages in temporal order, success only if both succeeded
 */
export function chain<A, B>(first: ClientResponse<A>, second: ClientResponse<B>): ClientResponse<B> {
  return respond(first.success && second.success, second.result, [...first.messages, ...second.messages]);
}

export function errorTexts(response: ClientResponse<unknown>): string[] {
  return response.messages.filter((m) => m.kind === 'error').map((m) => m.text);
}

export function infoTexts(response: ClientResponse<unknown>): string[] {
  return response.messages.filter((m) => m.kind === 'info').map((m) => m.text);
}
