import type { Template } from '../../interpreter/Template';

/**
 * Maps a template name used in `{{>name}}` to a template. Errors thrown
 * here reach the caller of `render` unchanged.
 */
export interface ITemplateResolver {
  get(name: string): Template;
}
