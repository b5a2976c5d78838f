import { type JsonMap, type JsonValue } from './json';

/** A user action such as a button press, reported back to the generator. */
export interface UserActionEvent {
  kind: 'userAction';
  surfaceId: string;
  name: string;
  sourceComponentId: string;
  timestamp: Date;
  isAction?: boolean;
  context: JsonMap;
}

/** A local value change (e.g. a text field edit) that stays on the client. */
export interface ValueChangeEvent {
  kind: 'valueChange';
  surfaceId: string;
  sourceComponentId: string;
  timestamp: Date;
  value: JsonValue;
}

export type UiEvent = UserActionEvent | ValueChangeEvent;

/**
 * Serializes a user action into the canonical outbound envelope
 * `{"userAction": {...}}`.
 */
export function encodeUserAction(event: UserActionEvent): string {
  const payload: Record<string, JsonValue> = {
    surfaceId: event.surfaceId,
    name: event.name,
    sourceComponentId: event.sourceComponentId,
    timestamp: event.timestamp.toISOString()
  };
  if (event.isAction ?? true) {
    payload.isAction = true;
  }
  payload.context = event.context;

  return JSON.stringify({ userAction: payload });
}
