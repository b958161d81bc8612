import { describe, it, expect, vi } from 'vitest';
import { logger } from '../../../config/logger.js';
import { seedSampleMenu } from '../menu.seed.js';
import { MenuService } from '../menu.service.js';
import { CatalogStore } from '../menu.store.js';
import { priceCategory } from '../food-item.model.js';

describe('seedSampleMenu', () => {
  it('loads the sample catalog through validation', async () => {
    const store = new CatalogStore();

    const count = await seedSampleMenu(new MenuService(store));

    expect(count).toBe(6);
    expect(store.findAll().map((item) => item.name)).toEqual([
      'Garlic Bread',
      'Chicken Tikka Masala',
      'Grilled Ribeye',
      'Greek Salad',
      'Chocolate Lava Cake',
      'Fresh Lemonade',
    ]);
    expect(store.findAll().map(priceCategory)).toEqual([
      'Budget',
      'Mid-range',
      'Premium',
      'Budget',
      'Budget',
      'Budget',
    ]);
  });

  it('logs the seeded count once', async () => {
    const info = vi.spyOn(logger, 'info');

    await seedSampleMenu(new MenuService(new CatalogStore()));

    const seeded = info.mock.calls.filter(([message]) => String(message).startsWith('Seeded'));
    expect(seeded.map(([message]) => message)).toEqual(['Seeded 6 sample menu items']);
    info.mockRestore();
  });
});
