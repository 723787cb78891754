import type { Category, RGB } from '../types/coco';

const category = (id: number, name: string, [r, g, b]: RGB): Category =>
  Object.freeze({ id, name, color: Object.freeze([r, g, b] as const), supercategory: '' });

// Urban-scene taxonomy; ids must stay contiguous from 0 (see CATEGORY_ID_RANGE)
const CATEGORIES: readonly Category[] = Object.freeze([
  category(0, 'road', [128, 64, 128]),
  category(1, 'sidewalk', [244, 35, 232]),
  category(2, 'building', [70, 70, 70]),
  category(3, 'wall', [102, 102, 156]),
  category(4, 'fence', [190, 153, 153]),
  category(5, 'pole', [153, 153, 153]),
  category(6, 'traffic_light', [250, 170, 30]),
  category(7, 'traffic_sign', [220, 220, 0]),
  category(8, 'vegetation', [107, 142, 35]),
  category(9, 'terrain', [152, 251, 152]),
  category(10, 'sky', [70, 130, 180]),
  category(11, 'person', [220, 20, 60]),
  category(12, 'rider', [255, 0, 0]),
  category(13, 'car', [0, 0, 142]),
  category(14, 'truck', [0, 0, 70]),
  category(15, 'bus', [0, 60, 100]),
  category(16, 'train', [0, 80, 100]),
  category(17, 'motorcycle', [0, 0, 230]),
  category(18, 'bicycle', [119, 11, 32]),
]);

export interface IdRange {
  readonly start: number;
  readonly end: number; // exclusive
}

class CategoryRegistry {
  private readonly byId: ReadonlyMap<number, Category>;

  constructor(private readonly categories: readonly Category[]) {
    this.byId = new Map(categories.map(c => [c.id, c]));
  }

  get size(): number {
    return this.categories.length;
  }

  list(): readonly Category[] {
    return this.categories;
  }

  has(id: number): boolean {
    return this.byId.has(id);
  }

  colorOf(id: number): RGB {
    const found = this.byId.get(id);
    if (!found) throw new RangeError(`Unknown category id: ${id}`);
    return found.color;
  }
}

export const categoryRegistry = new CategoryRegistry(CATEGORIES);

export const CATEGORY_ID_RANGE: IdRange = Object.freeze({ start: 0, end: CATEGORIES.length });

// The decomposer walks CATEGORY_ID_RANGE, not the registry; both must agree.
CATEGORIES.forEach((c, index) => {
  if (c.id !== CATEGORY_ID_RANGE.start + index) {
    throw new Error(`Category registry out of order at index ${index} (id ${c.id})`);
  }
});
