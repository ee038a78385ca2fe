export {
  InfraCommandTool,
  InfraCommandParamsSchema,
  type InfraCommandParams,
  type InfraCommandToolOptions,
} from './infra-tool.js';
export {
  HttpCommandExecutor,
  EmulatedCommandExecutor,
  type CommandExecutor,
  type CommandExecution,
  type HttpCommandExecutorOptions,
} from './command-executor.js';
export { formatCommand, classifyCommand, type CommandCategory } from './command-formatter.js';
