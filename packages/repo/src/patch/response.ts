import type { GenerationOutcome, ModelResponse, PatchSet, ToolCall, ToolSpec } from '@patchloop/shared';
import { BEGIN_PATCH, EnvelopeParseError, parseEnvelope } from './envelope';
import {
  NoChangePayloadSchema,
  OPERATIONS_JSON_SCHEMA,
  OperationsParseError,
  OperationsPayloadSchema,
  toPatchSet,
} from './operations';

export const APPLY_PATCH_TOOL = 'apply_patch';
export const APPLY_OPERATIONS_TOOL = 'apply_operations';
export const NO_CHANGE_TOOL = 'no_change';

/**
 * Tools offered to the generation service. Any of them is a complete answer.
 */
export const PATCH_TOOLS: ToolSpec[] = [
  {
    name: APPLY_PATCH_TOOL,
    description: `Apply a patch in the "${BEGIN_PATCH}" ... "*** End Patch" envelope format`,
    inputSchema: {
      type: 'object',
      properties: { input: { type: 'string' } },
      required: ['input'],
    },
  },
  {
    name: APPLY_OPERATIONS_TOOL,
    description: 'Apply an ordered list of create, modify, delete and rename operations',
    inputSchema: OPERATIONS_JSON_SCHEMA,
  },
  {
    name: NO_CHANGE_TOOL,
    description: 'Declare that the project already satisfies the specification',
    inputSchema: { type: 'object', properties: {} },
  },
];

const JSON_FENCE = /```json\s*\n([\s\S]*?)```/;

function malformed(message: string): GenerationOutcome {
  return { kind: 'malformed', reason: 'malformed-response', message };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new OperationsParseError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

function operationsFrom(value: unknown): PatchSet {
  const payload = OperationsPayloadSchema.safeParse(value);
  if (!payload.success) {
    const first = payload.error.issues[0];
    throw new OperationsParseError(
      `Invalid operations: ${first.path.join('.') || '(root)'}: ${first.message}`,
    );
  }
  return toPatchSet(payload.data);
}

/** `apply_patch` accepts the envelope as a bare string or under `input` or `patch` */
function envelopeArgument(args: unknown): string {
  if (typeof args === 'string') return args;
  if (typeof args === 'object' && args !== null) {
    for (const key of ['input', 'patch']) {
      const value: unknown = Reflect.get(args, key);
      if (typeof value === 'string') return value;
    }
  }
  throw new OperationsParseError(`${APPLY_PATCH_TOOL} expects a string "input"`);
}

function fromToolCalls(calls: ToolCall[]): GenerationOutcome {
  const operations: PatchSet['operations'] = [];
  let sawPatch = false;
  let sawNoChange = false;

  for (const call of calls) {
    switch (call.name) {
      case APPLY_PATCH_TOOL:
        operations.push(...parseEnvelope(envelopeArgument(call.arguments)).operations);
        sawPatch = true;
        break;
      case APPLY_OPERATIONS_TOOL: {
        const args = typeof call.arguments === 'string' ? parseJson(call.arguments) : call.arguments;
        operations.push(...operationsFrom(args).operations);
        sawPatch = true;
        break;
      }
      case NO_CHANGE_TOOL:
        sawNoChange = true;
        break;
      default:
        return malformed(`Unknown tool "${call.name}"`);
    }
  }

  if (sawPatch) return { kind: 'patch', patchSet: { operations } };
  if (sawNoChange) return { kind: 'no-change' };
  return malformed('No tool calls');
}

function fromText(text: string): GenerationOutcome {
  const trimmed = text.trim();
  if (!trimmed) return malformed('Empty response');

  if (trimmed.includes(BEGIN_PATCH)) {
    return { kind: 'patch', patchSet: parseEnvelope(trimmed) };
  }

  const fenced = JSON_FENCE.exec(trimmed);
  const jsonText = fenced ? fenced[1] : trimmed.startsWith('{') ? trimmed : undefined;
  if (jsonText === undefined) {
    return malformed('Response contains neither a patch envelope nor a JSON block');
  }

  const value = parseJson(jsonText);
  if (NoChangePayloadSchema.safeParse(value).success) return { kind: 'no-change' };
  return { kind: 'patch', patchSet: operationsFrom(value) };
}

/**
 * Resolves a raw model response into a closed outcome. Tool calls win over
 * text; parse failures become `malformed`, never exceptions.
 */
export function parseResponse(response: ModelResponse): GenerationOutcome {
  try {
    if (response.toolCalls && response.toolCalls.length > 0) {
      return fromToolCalls(response.toolCalls);
    }
    return fromText(response.text ?? '');
  } catch (error) {
    if (error instanceof EnvelopeParseError || error instanceof OperationsParseError) {
      return malformed(error.message);
    }
    throw error;
  }
}
