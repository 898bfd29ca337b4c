import { createElement, type ComponentType } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';

/** Render a page component to a complete HTML document. */
export function renderPage<P extends object>(component: ComponentType<P>, props: P): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(createElement(component, props))}`;
}
