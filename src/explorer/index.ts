export { OntologyExplorer } from './ontology-explorer';
export type {
  NavigateQuery,
  EntitySelector,
  TaxonomyFilter,
  RelatedOptions,
  IntrinsicOptions,
  TaskTrace,
} from './ontology-explorer';
