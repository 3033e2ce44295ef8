/**
 * Page layout for script panels.
 * Panels are spread evenly across pages, earlier pages taking the larger share.
 */

/**
 * Number of pages a comic with this many panels actually fills.
 */
export function resolvePageCount(panelCount: number, targetPages: number): number {
    if (panelCount <= 0) {
        return 0;
    }
    return Math.max(1, Math.min(targetPages, panelCount));
}

/**
 * Returns the 1-based page number for each panel, in panel order.
 */
export function assignPages(panelCount: number, targetPages: number): number[] {
    const pageCount = resolvePageCount(panelCount, targetPages);
    const pages: number[] = [];
    for (let index = 0; index < panelCount; index++) {
        pages.push(Math.floor((index * pageCount) / panelCount) + 1);
    }
    return pages;
}

/**
 * Groups items by page number, pages ascending.
 */
export function groupByPage<T extends { pageNumber: number }>(items: readonly T[]): Map<number, T[]> {
    const grouped = new Map<number, T[]>();
    const sorted = [...items].sort((a, b) => a.pageNumber - b.pageNumber);
    for (const item of sorted) {
        const page = grouped.get(item.pageNumber) ?? [];
        page.push(item);
        grouped.set(item.pageNumber, page);
    }
    return grouped;
}
