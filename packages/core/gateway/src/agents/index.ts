export type { Agent, AgentContext, AgentReply } from './types.js';
export { ToolCallingAgent, type ToolCallingAgentOptions } from './tool-calling-agent.js';
export { ConversationalAgent, type ConversationalAgentOptions } from './conversational-agent.js';
