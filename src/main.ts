#!/usr/bin/env node
/**
 * Voxel Oasis - CPU ray tracer for an animated cube scene, drawn to the
 * terminal with truecolor half blocks.
 */

import { Camera } from "./camera";
import { parseArgs, terminalSize, USAGE } from "./cli";
import { Framebuffer } from "./framebuffer";
import { applyKeys, onInterrupt } from "./input";
import { Integrator } from "./integrator";
import { Renderer } from "./renderer";
import { oasisScene } from "./scenes/oasis";
import { TerminalPresenter } from "./terminal";
import { createLogger, setLogLevel } from "./utils/log";

const log = createLogger("oasis");

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }
  if (args.verbose) setLogLevel("debug");

  const scene = oasisScene;
  scene.init();

  const size = terminalSize(process.stdout.columns, process.stdout.rows, scene.config.render);
  const framebuffer = new Framebuffer(args.width ?? size.width, args.height ?? size.height);
  const delayMs = args.delayMs ?? scene.config.render.frameDelayMs;

  const camera = new Camera(scene.config.camera);
  const renderer = new Renderer(new Integrator({ shadowMode: args.shadows }));
  const presenter = new TerminalPresenter(process.stdout);

  log.debug(
    `scene ${scene.name}: ${framebuffer.width}x${framebuffer.height} px, shadows=${args.shadows}`
  );

  // ==========================================================================
  // Input Handling
  // ==========================================================================

  let running = true;
  const interactive = process.stdin.isTTY && !args.once;

  const onData = (data: Buffer) => {
    if (!applyKeys(camera, data.toString())) running = false;
  };

  // Without raw mode Ctrl-C arrives as a signal
  let detachInterrupt = () => {};

  if (interactive) {
    process.stdin.setRawMode(true);
    process.stdin.resume();
    process.stdin.on("data", onData);
  } else {
    detachInterrupt = onInterrupt(process, () => {
      running = false;
    });
  }

  // ==========================================================================
  // Render Loop
  // ==========================================================================

  const start = performance.now();
  let frames = 0;
  let renderMs = 0;

  presenter.start();
  try {
    while (running) {
      const t = args.once ? args.time : args.time + (performance.now() - start) / 1000;
      const { objects, lightPositions, ambientIntensity } = scene.update(t);

      const stats = renderer.render(framebuffer, objects, camera, lightPositions, ambientIntensity);
      presenter.present(framebuffer);

      frames++;
      renderMs += stats.elapsedMs;
      log.debug(
        `frame ${frames} t=${t.toFixed(2)}: ${objects.length} objects, ${stats.elapsedMs.toFixed(1)}ms`
      );

      if (args.once || (args.frames > 0 && frames >= args.frames)) break;
      await sleep(delayMs);
    }
  } finally {
    presenter.stop();
    if (interactive) {
      process.stdin.off("data", onData);
      process.stdin.setRawMode(false);
      process.stdin.pause();
    }
    detachInterrupt();
  }

  const average = frames > 0 ? renderMs / frames : 0;
  log.info(`rendered ${frames} frame(s), ${average.toFixed(1)}ms average`);
}

main().catch((err) => {
  log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
