const BANNER = `
  ╔╦╗┌─┐┌┬┐┌─┐┬ ┬┬┌─┐┌─┐
   ║║├─┤ │ ├─┤││││└─┐├┤
  ═╩╝┴ ┴ ┴ ┴ ┴└┴┘┴└─┘└─┘
`;

const TAGLINES = [
  "Tidy tables, friendly chats.",
  "Missing values, found.",
  "Duplicates need not apply.",
  "Your spreadsheet's second opinion.",
];

export function printBanner(version: string): void {
  const tagline = TAGLINES[Math.floor(Math.random() * TAGLINES.length)];
  console.log(BANNER);
  console.log(`  v${version} · ${tagline}\n`);
}
