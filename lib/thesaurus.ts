/*
  Subject thesaurus lookups. Keywords are stored on scheme records as term
  URIs; pages show the short label and edit forms offer the long label, which
  spells out the ancestry ("Chemistry < Natural sciences < Science").
*/

export interface ThesaurusTerm {
  uri: string;
  label: string;
  /** URI of the immediately broader term; absent for top-level domains. */
  broader?: string;
}

export interface Thesaurus {
  getLabel(uri: string): string | undefined;
  getLongLabel(uri: string): string | undefined;
  getUri(label: string): string | undefined;
  getChoices(): string[];
}

interface Entry {
  uri: string;
  label: string;
  longLabel: string;
}

export function createThesaurus(terms: readonly ThesaurusTerm[]): Thesaurus {
  const byUri = new Map<string, ThesaurusTerm>();
  for (const term of terms) byUri.set(term.uri, term);

  const longLabel = (term: ThesaurusTerm): string => {
    const parts = [term.label];
    const seen = new Set([term.uri]);
    let parent = term.broader ? byUri.get(term.broader) : undefined;
    while (parent && !seen.has(parent.uri)) {
      parts.push(parent.label);
      seen.add(parent.uri);
      parent = parent.broader ? byUri.get(parent.broader) : undefined;
    }
    return parts.join(' < ');
  };

  const entries: Entry[] = terms.map((term) => ({
    uri: term.uri,
    label: term.label,
    longLabel: longLabel(term),
  }));
  const entryByUri = new Map(entries.map((e) => [e.uri, e]));

  return {
    getLabel: (uri) => entryByUri.get(uri)?.label,
    getLongLabel: (uri) => entryByUri.get(uri)?.longLabel,
    getUri(label) {
      const useLong = label.includes('<');
      return entries.find((e) => (useLong ? e.longLabel : e.label) === label)?.uri;
    },
    getChoices: () => entries.map((e) => e.longLabel),
  };
}
