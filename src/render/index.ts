export {
  renderSvg,
  buildSvgElements,
  wrapLabel,
  RenderError,
  LABEL_MAX_LENGTH,
  FONT_FAMILY,
  EDGE_COLOR,
  type RenderOptions,
} from "./svg";
