import { vi } from "vitest";

import type { Logger } from "../logger";

export function quietLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export const COLOR_CONTAINER_PAGE = `
<html><body>
  <div id="variation_color_name">
    <ul>
      <li>Black</li>
      <li>White</li>
      <li>1+</li>
      <li>2+</li>
      <li>Add to List</li>
    </ul>
  </div>
  <select id="quantity" name="quantity"><option>1</option><option>2</option></select>
</body></html>
`;

export const STRUCTURED_SIZE_PAGE = `
<html><head>
  <script type="application/ld+json">
    {
      "@context": "https://schema.org",
      "@type": "ProductGroup",
      "name": "Trail Jacket",
      "hasVariant": [
        {
          "@type": "Product",
          "name": "Trail Jacket Medium",
          "size": "Medium",
          "sku": "TJ-M",
          "offers": { "@type": "Offer", "price": "31.99", "availability": "https://schema.org/InStock" }
        }
      ]
    }
  </script>
</head><body>
  <div class="size-button-group"><button>medium</button></div>
</body></html>
`;

export const NOISE_ONLY_PAGE = `
<html><body>
  <div id="variation_size_name">
    <ul><li>Select</li><li>1+</li><li>Update Page</li></ul>
  </div>
</body></html>
`;

export const SNAPSHOT_WITH_COLORS = `
<div id="variation_color_name"><ul><li>Red</li><li>Blue</li></ul></div>
`;

export const EXPANDABLE_PAGE = `
<html><body>
  <span data-color-name="Sage"></span>
  <div id="twister-wrapper">
    <span class="a-button-toggle" data-action="twister-select">Blue</span>
    <span class="a-button-toggle" data-action="twister-select">Selected</span>
    <span class="a-button" aria-label="see more options">See more</span>
  </div>
</body></html>
`;
