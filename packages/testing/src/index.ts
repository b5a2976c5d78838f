import { FakeLogger, FakeModelAdapter, type FakeModelTurn } from "@strata/adapters";
import {
  resolveStrataConfig,
  type Component,
  type JsonMap,
  type ModelTurnResult,
  type StrataConfig,
  type StrataConfigInput,
  type ToolCall,
  type UserActionEvent,
} from "@strata/core";
import { FunctionRegistry, createBasicFunctions } from "@strata/engine";

export { FakeLogger, FakeModelAdapter };

export const TEST_SURFACE_ID = "s1";
export const TEST_TIMESTAMP = new Date("2026-01-01T00:00:00.000Z");

export function createTestConfig(overrides?: StrataConfigInput): StrataConfig {
  return resolveStrataConfig({
    logging: { level: "debug", prettyPrint: false },
    ...overrides,
  });
}

export function createTestFunctions(): FunctionRegistry {
  return new FunctionRegistry(createBasicFunctions({ locale: "en-US" }));
}

export function createComponent(
  id: string,
  kind: string,
  properties: JsonMap = {},
): Component {
  return { id, component: { [kind]: properties } };
}

export function createTextComponent(id: string, text: string): Component {
  return createComponent(id, "Text", { text: { literalString: text } });
}

export function createToolCall(
  name: string,
  args: Record<string, unknown>,
  id = `call-${name}`,
): ToolCall {
  return { id, name, arguments: args };
}

export function createFakeTurn(overrides?: Partial<ModelTurnResult>): ModelTurnResult {
  return {
    toolCalls: [],
    text: "Fake response",
    ...overrides,
  };
}

export function createFakeModel(turns: FakeModelTurn[] = []): FakeModelAdapter {
  return new FakeModelAdapter(turns);
}

export function createUserAction(overrides?: Partial<UserActionEvent>): UserActionEvent {
  return {
    kind: "userAction",
    surfaceId: TEST_SURFACE_ID,
    name: "submit",
    sourceComponentId: "button",
    timestamp: TEST_TIMESTAMP,
    context: {},
    ...overrides,
  };
}
