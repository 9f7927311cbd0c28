// backend/services/web/src/views/guitar.ts
import { formatPrice, type Guitar } from "../catalog/catalog";
import type { View } from "../render/Renderer";
import { layout } from "./layout";

export type GuitarData = { guitar: Guitar };

export const guitarView: View<GuitarData> = (out, { guitar }, ctx) => {
  layout(out, ctx, guitar.name, () => {
    out.write("<h1>").text(guitar.name).write("</h1>\n");
    out.write("<p>").text(`${guitar.maker}, ${guitar.body}`).write("</p>\n");
    out.write("<p>").text(guitar.summary).write("</p>\n");
    out.write('<p class="price">').text(formatPrice(guitar.priceCents)).write("</p>\n");
  });
};
