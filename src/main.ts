/**
 * Main entry point - loads content, builds the desktop and starts the loop.
 */

import './style.css';
import { configFromQuery } from './config';
import { SoundBoard } from './audio';
import { ContentStore } from './content';
import { DomRenderer } from './desktop';
import { FrameLoop, Game, InputController } from './game';

// Scale the fixed-size desktop to fit the viewport
function fitToViewport(root: HTMLElement, width: number, height: number) {
  const scale = Math.min(window.innerWidth / width, window.innerHeight / height);
  root.style.transform = `scale(${scale})`;
}

async function main() {
  const root = document.getElementById('desktop');
  if (!root) {
    throw new Error('Missing #desktop element');
  }

  const config = configFromQuery(window.location.search);
  fitToViewport(root, config.screen.width, config.screen.height);
  window.addEventListener('resize', () => fitToViewport(root, config.screen.width, config.screen.height));

  const content = await ContentStore.load(undefined, config.contentBaseUrl);

  let loop: FrameLoop | null = null;
  let input: InputController | null = null;

  const game = new Game({
    config,
    content,
    renderer: new DomRenderer(root),
    sound: new SoundBoard({ urls: config.sounds, muted: config.muted }),
    onExit: () => {
      loop?.stop();
      input?.detach();
      root.classList.add('exited');
    },
  });

  input = new InputController(root, game, config.screen);
  input.attach();

  loop = new FrameLoop(dt => game.tick(dt));
  game.start();
  loop.start();
}

main().catch(err => console.error('[Game] Failed to start:', err));
