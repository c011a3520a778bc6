#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { createCliMain, isCliInvocation } from "./cli/bootstrap.js";

export { createPanel } from "./panel/panel.js";
export type { Panel, PanelDeps } from "./panel/panel.js";
export { runRenderLoop } from "./panel/render-loop.js";
export { createTextRenderer } from "./panel/text-renderer.js";
export { createTerminalSink } from "./panel/terminal-sink.js";
export type { FrameSink, FrameView, Renderer } from "./panel/types.js";
export { loadConfig } from "./config/loader.js";
export type { DeskpanelConfig } from "./config/schema.js";

const main = createCliMain(createProgram);

if (isCliInvocation(process.argv, import.meta.url)) {
  void main();
}

export { main, isCliInvocation };
