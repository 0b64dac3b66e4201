export { compileTaxonomy, emptyTaxonomy, loadTaxonomy, resolveTaxonomyPath } from "./loader";
