// backend/services/web/src/views/index.ts
import type { ViewTable } from "../render/Renderer";
import { guitarView, type GuitarData } from "./guitar";
import { homeView, type HomeData } from "./home";

export type WebViews = {
  home: HomeData;
  guitar: GuitarData;
};

export const webViews: ViewTable<WebViews> = {
  home: homeView,
  guitar: guitarView,
};
