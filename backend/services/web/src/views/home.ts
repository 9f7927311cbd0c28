// backend/services/web/src/views/home.ts
import { formatPrice, type Guitar } from "../catalog/catalog";
import type { View } from "../render/Renderer";
import { layout } from "./layout";

export type HomeData = { featured: readonly Guitar[] };

export const homeView: View<HomeData> = (out, data, ctx) => {
  layout(out, ctx, "Featured guitars", () => {
    out.write("<h1>Featured guitars</h1>\n<ul>\n");
    for (const g of data.featured) {
      out.write('<li><a href="/guitars/').text(g.slug).write('">').text(g.name).write("</a> ");
      out.text(formatPrice(g.priceCents)).write("</li>\n");
    }
    out.write("</ul>\n");
  });
};
