export { FigureGenerator, defaultGeneratorConfig, type FigureGeneratorConfig } from "./generator";
