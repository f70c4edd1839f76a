export const TAG_KEYWORDS: Readonly<Record<string, readonly string[]>> = {
  immersive: ['immersive', 'interactive'],
  artsy: ['gallery', 'art', 'museum'],
  outdoor: ['park', 'outdoor', 'garden', 'rooftop'],
  nightlife: ['club', 'bar', 'dj', 'nightlife'],
  family: ['family', 'kids', 'children'],
};

// Substring matching, so "art" also fires on "party" and "bar" on "barbecue".
export function extractTags(text: string): string[] {
  const lowered = text.toLowerCase();
  const matched = new Set<string>();

  for (const [tag, keywords] of Object.entries(TAG_KEYWORDS)) {
    if (keywords.some(keyword => lowered.includes(keyword))) {
      matched.add(tag);
    }
  }

  return Array.from(matched).sort();
}
