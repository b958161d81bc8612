import { readFile } from 'fs/promises';
import { logger } from '../../config/logger.js';
import { MenuService, menuService } from './menu.service.js';

const SAMPLE_MENU_URL = new URL('../../../data/sample-menu.json', import.meta.url);

/**
 * Load the sample catalog through the regular validation path.
 * Returns the number of items created.
 */
export async function seedSampleMenu(
  service: MenuService = menuService,
  source: URL = SAMPLE_MENU_URL
): Promise<number> {
  const raw = await readFile(source, 'utf-8');
  const candidates: unknown = JSON.parse(raw);

  if (!Array.isArray(candidates)) {
    throw new Error(`Sample menu must be a JSON array: ${source.pathname}`);
  }

  for (const candidate of candidates) {
    await service.createItem(candidate);
  }

  logger.info(`Seeded ${candidates.length} sample menu items`);
  return candidates.length;
}
