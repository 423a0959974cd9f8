export { Converter, type ConverterOptions, type ConverterState } from "./Converter.js";
export {
  convert,
  convertToString,
  type ConvertOptions,
  type ConvertToStringOptions,
} from "./convert.js";
