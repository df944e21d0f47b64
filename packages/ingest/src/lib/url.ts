export const resolveUrl = (href: string | null | undefined, baseUrl: string): string | null => {
  if (!href) {
    return null;
  }
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
};
