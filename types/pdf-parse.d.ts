// The package entry runs a debug self-test when loaded without a parent module, as it is from ESM.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse = require('pdf-parse');
  export = pdfParse;
}
