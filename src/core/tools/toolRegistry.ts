/**
 * Register, validate, and run the deterministic tools a handler owns.
 */
import { describeError } from '../../shared/errors/app-error';
import { Tool, ToolError, ToolMetadata, ToolName } from './tool-types';

const MAX_ARGS_SIZE = 10 * 1024;

type RegisteredTool = Tool<unknown, unknown>;

/** Return shape for validating tool calls before execution. */
export type ToolValidationResult =
  | { success: true; args: unknown }
  | { success: false; error: string };

/** Outcome of one validated tool run, with the value already rendered for prompts. */
export type ToolRun =
  | { success: true; toolName: ToolName; value: unknown; display: string; metadata: ToolMetadata }
  | { success: false; toolName: ToolName; error: ToolError; metadata: ToolMetadata };

export class ToolRegistry {
  private tools: Map<ToolName, RegisteredTool> = new Map();

  /**
   * Register a tool under its own name.
   *
   * @throws Error when the name is already taken.
   */
  register<TArgs, TValue>(tool: Tool<TArgs, TValue>): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: ToolName): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  has(name: ToolName): boolean {
    return this.tools.has(name);
  }

  listNames(): ToolName[] {
    return Array.from(this.tools.keys());
  }

  /** Check an untrusted argument payload against the tool's size limit and schema. */
  validateToolCall(call: { name: ToolName; args: unknown }): ToolValidationResult {
    const { name, args } = call;

    const tool = this.tools.get(name);
    if (!tool) {
      return {
        success: false,
        error: `Unknown tool: "${name}". Allowed tools: ${this.listNames().join(', ') || 'none'}`,
      };
    }

    let argsJson: string | undefined;
    try {
      argsJson = JSON.stringify(args);
    } catch {
      argsJson = undefined;
    }
    if (typeof argsJson !== 'string') {
      return { success: false, error: `Tool arguments for "${name}" must be JSON-serializable` };
    }

    if (argsJson.length > MAX_ARGS_SIZE) {
      return {
        success: false,
        error: `Tool arguments exceed maximum size (${argsJson.length} > ${MAX_ARGS_SIZE} bytes)`,
      };
    }

    const parseResult = tool.schema.safeParse(args);
    if (!parseResult.success) {
      const issues = parseResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      return { success: false, error: `Invalid arguments for tool "${name}": ${issues}` };
    }

    return { success: true, args: parseResult.data };
  }

  /**
   * Validate and run a tool call.
   *
   * Tool-reported failures pass through unchanged; validation problems become `InvalidArguments`
   * and anything a tool throws becomes `ExecutionError`.
   */
  executeValidated(call: { name: ToolName; args: unknown }): ToolRun {
    const toolName = call.name;
    const validation = this.validateToolCall(call);
    const tool = this.tools.get(toolName);
    if (!validation.success || !tool) {
      const message = validation.success ? `Unknown tool: "${toolName}"` : validation.error;
      return { success: false, toolName, error: { kind: 'InvalidArguments', message }, metadata: {} };
    }

    try {
      const result = tool.invoke(validation.args);
      if (!result.success) {
        return { success: false, toolName, error: result.error, metadata: result.metadata };
      }
      return {
        success: true,
        toolName,
        value: result.value,
        display: tool.formatValue(result.value),
        metadata: result.metadata,
      };
    } catch (err) {
      return {
        success: false,
        toolName,
        error: { kind: 'ExecutionError', message: `Tool execution failed: ${describeError(err)}` },
        metadata: {},
      };
    }
  }
}
