// The package entry runs a self-test when loaded as an ES module; the lib file does not.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdf from 'pdf-parse';
  export default pdf;
}
