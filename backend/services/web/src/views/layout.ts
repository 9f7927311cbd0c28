// backend/services/web/src/views/layout.ts
import type { GrowableBuffer } from "../render/BufferPool";
import type { RenderContext } from "../render/Renderer";

function stylesheet(out: GrowableBuffer, ctx: RenderContext, logical: string): void {
  out.write('<link rel="stylesheet" href="').text(ctx.assetUrl(logical)).write('"');
  const sri = ctx.assetSri(logical);
  if (sri) out.write(' integrity="').text(sri).write('" crossorigin="anonymous"');
  out.write(">\n");
}

function script(out: GrowableBuffer, ctx: RenderContext, logical: string): void {
  out.write('<script src="').text(ctx.assetUrl(logical)).write('"');
  const sri = ctx.assetSri(logical);
  if (sri) out.write(' integrity="').text(sri).write('" crossorigin="anonymous"');
  out.write(' nonce="').text(ctx.nonce).write('" defer></script>\n');
}

/** Page shell; `body` writes everything inside <main>. */
export function layout(
  out: GrowableBuffer,
  ctx: RenderContext,
  title: string,
  body: () => void
): void {
  out.write('<!doctype html>\n<html lang="en">\n<head>\n<meta charset="utf-8">\n');
  out.write("<title>").text(title).write(" | fretwire</title>\n");
  stylesheet(out, ctx, "/css/app.css");
  script(out, ctx, "/js/app.js");
  out.write("</head>\n<body>\n<main>\n");
  body();
  out.write("</main>\n</body>\n</html>\n");
}
