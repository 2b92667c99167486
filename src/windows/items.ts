/**
 * Item containers - the Inventory, FTL cargo hold and Zomboid backpack.
 *
 * An item lives in exactly one container. A transfer checks every
 * precondition first and only then moves the item, so a rejected drop leaves
 * both containers untouched.
 */

import type { FtlContent, InventoryContent, Item, ItemContent, WindowContent, ZomboidContent } from './types';
import { isItemContent } from './types';

export function itemsOf(content: WindowContent): readonly Item[] {
  return isItemContent(content) ? content.items : [];
}

export function holdsItem(content: WindowContent, itemId: string): boolean {
  return itemsOf(content).some(item => item.id === itemId);
}

export function findItem(content: WindowContent, itemId: string): Item | undefined {
  return itemsOf(content).find(item => item.id === itemId);
}

/** Whether `content` could take one more item. */
export function accepts(content: WindowContent, item: Item): boolean {
  return isItemContent(content)
    && content.items.length < content.capacity
    && !content.items.some(held => held.id === item.id);
}

function take(content: ItemContent, itemId: string): Item | undefined {
  const index = content.items.findIndex(item => item.id === itemId);
  if (index < 0) return undefined;
  return content.items.splice(index, 1)[0];
}

function put(content: ItemContent, item: Item) {
  content.items.push(item);
}

/**
 * Move an item from source to dest. Returns false, with nothing changed, when
 * the item is not in source or dest cannot take it.
 */
export function transferItem(source: WindowContent, dest: WindowContent, itemId: string): boolean {
  if (source === dest) return false;
  if (!isItemContent(source) || !isItemContent(dest)) return false;

  const item = findItem(source, itemId);
  if (!item || !accepts(dest, item)) return false;

  const taken = take(source, itemId);
  if (!taken) return false;
  put(dest, taken);
  return true;
}

// Ids are prefixed with the container that starts with the item
function makeItems(owner: ItemContent['kind'], names: Array<[string, string]>): Item[] {
  return names.map(([name, icon], index) => ({ id: `${owner}-${index + 1}`, name, icon }));
}

export function createInventory(): InventoryContent {
  return {
    kind: 'inventory',
    columns: 6,
    rows: 4,
    capacity: 24,
    items: makeItems('inventory', [['Sword', '🗡️'], ['Potion', '🧪'], ['Shield', '🛡️']]),
  };
}

export function createFtlHold(): FtlContent {
  return {
    kind: 'ftl',
    capacity: 4,
    items: makeItems('ftl', [['Fuel Cell', '⛽'], ['Missile', '🚀']]),
  };
}

export const ZOMBOID_SCENES = [
  'Day 14. The generator is still running.',
  'Something is moving near the fence.',
  'Boarded up the kitchen window.',
  'Found a can opener. Morale improves.',
] as const;

export function createZomboidPack(): ZomboidContent {
  return {
    kind: 'zomboid',
    capacity: 8,
    scene: 0,
    sceneElapsedMs: 0,
    items: makeItems('zomboid', [['Axe', '🪓'], ['Canned Beans', '🥫']]),
  };
}

/** Cycle the Zomboid scene caption. Returns true when the caption changed. */
export function advanceScene(content: ZomboidContent, dtMs: number, sceneMs: number): boolean {
  content.sceneElapsedMs += dtMs;
  if (content.sceneElapsedMs < sceneMs) return false;
  content.sceneElapsedMs %= sceneMs;
  content.scene = (content.scene + 1) % ZOMBOID_SCENES.length;
  return true;
}
