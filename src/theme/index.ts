import { createTheme, type MantineColorsTuple } from '@mantine/core';

// Accent used for primary actions and highlighted report values
const lime: MantineColorsTuple = [
  '#fbffe5',
  '#f5fecf',
  '#ebfda0',
  '#e0fd6c',
  '#d7fd47',
  '#d0fd3e',
  '#bce332',
  '#a4c826',
  '#8ead1b',
  '#75900b',
];

const teal: MantineColorsTuple = [
  '#e0f2f1',
  '#b2dfdb',
  '#80cbc4',
  '#4db6ac',
  '#26a69a',
  '#10b981',
  '#00897b',
  '#00796b',
  '#00695c',
  '#004d40',
];

export const theme = createTheme({
  primaryColor: 'lime',
  primaryShade: 5,
  colors: {
    lime,
    teal,
  },
  defaultRadius: 'md',
  shadows: {
    sm: '0 2px 8px rgba(0, 0, 0, 0.15)',
    md: '0 4px 12px rgba(0, 0, 0, 0.15)',
    lg: '0 8px 24px rgba(0, 0, 0, 0.25)',
  },
  fontFamily:
    '-apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Oxygen, Ubuntu, Cantarell, "Open Sans", "Helvetica Neue", sans-serif',
  headings: {
    fontFamily:
      '-apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Oxygen, Ubuntu, Cantarell, "Open Sans", "Helvetica Neue", sans-serif',
    fontWeight: '700',
  },
});
