export { EchoTool, EchoParamsSchema, type EchoParams } from './echo-tool.js';
