import type { Heading } from './heading-extractor';

export interface HeadingNode {
  title: string;
  page: number;
  level: number;
  children: HeadingNode[];
}

/** Nest an ordered heading list into an outline by level. */
export function headingsToTree(headings: Heading[]): HeadingNode[] {
  const roots: HeadingNode[] = [];
  const stack: HeadingNode[] = [];

  for (const heading of headings) {
    const node: HeadingNode = { title: heading.text, page: heading.page, level: heading.level, children: [] };

    while (stack.length > 0 && stack[stack.length - 1].level >= heading.level) {
      stack.pop();
    }

    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
    stack.push(node);
  }

  return roots;
}
