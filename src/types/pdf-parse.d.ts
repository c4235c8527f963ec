// The package root runs a debug harness when loaded as ESM; the library
// entry is imported directly and shares the published @types/pdf-parse types.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse from 'pdf-parse';
  export default pdfParse;
}
