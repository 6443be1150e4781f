export {
  readOsmElements,
  readAllOsmElements,
  parseElementFragment,
  type OsmInput,
  type ReadOsmOptions,
} from './osm-reader.js';
export { ElementFragmentScanner, type ElementFragment } from './fragment-scanner.js';
