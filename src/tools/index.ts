import { RegisteredTool } from '../utils/toolDefinition.js';
import extractSubtitlesTool from './extractSubtitles.js';
import getSubtitlesTool from './getSubtitles.js';
import searchSubtitlesTool from './searchSubtitles.js';
import resolveTimeRangeTool from './resolveTimeRange.js';
import generateClipTool from './generateClip.js';

/**
 * Every tool the server exposes, in the order clients list them.
 * To add a tool, create it with defineTool() in this directory and append it here.
 */
export const ALL_TOOLS: RegisteredTool[] = [
  extractSubtitlesTool,
  getSubtitlesTool,
  searchSubtitlesTool,
  resolveTimeRangeTool,
  generateClipTool,
];
