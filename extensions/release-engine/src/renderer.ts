/**
 * Renderer for charts whose templates are already rendered manifest text.
 */

import type { ChartRenderer } from "./client.js";
import { joinManifests } from "./manifest.js";
import type { Chart } from "./types.js";

export class PrerenderedChartRenderer implements ChartRenderer {
  async render(chart: Chart): Promise<string> {
    const parts = (chart.templates ?? [])
      .filter((template) => template.data.trim() !== "")
      .map((template) => `# Source: ${chart.metadata.name}/${template.name}\n${template.data.trim()}`);
    return joinManifests(parts);
  }
}
