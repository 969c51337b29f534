export const theme = {
  brand: 'green',
  accent: 'cyan',
  muted: 'gray',
  border: 'gray',
  panelTitle: 'gray',
  status: {
    working: 'yellow',
    error: 'red',
    ok: 'green',
    worse: 'red',
    better: 'green',
  },
} as const;
