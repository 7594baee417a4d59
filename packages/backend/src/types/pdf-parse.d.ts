// The package root runs a debug self-test when loaded through ESM; the library entry does not.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdfParse from "pdf-parse";
  export default pdfParse;
}
