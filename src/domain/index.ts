export type {
  PostEvent,
  PostEmbed,
  PostImage,
  PostFacet,
  FacetFeature,
} from './post-event.js';
