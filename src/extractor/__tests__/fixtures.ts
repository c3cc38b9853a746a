// Builders for timeline markup shaped like the portal's dashboard.

export interface ItemSpec {
  title?: string;
  course?: string;
  due?: string;
  href?: string;
}

export function timelineItem({ title, course, due, href }: ItemSpec): string {
  const link = href ? ` href="${href}"` : '';
  return [
    '<div data-region="timeline-item">',
    title !== undefined ? `<h6 class="event-name"><a${link}>${title}</a></h6>` : '',
    course !== undefined ? `<small class="course-name">${course}</small>` : '',
    due !== undefined ? `<span data-region="event-due">${due}</span>` : '',
    '</div>',
  ].join('');
}

export function timelinePage(items: ItemSpec[]): string {
  return `<html><body><div data-region="timeline">${items.map(timelineItem).join('')}</div></body></html>`;
}

export const LAYOUT_CHANGED_PAGE = '<html><body><div class="dashboard">Welcome back</div></body></html>';
