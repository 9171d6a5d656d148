export const NO_HOLIDAYS = "none";

export function buildPrompt(industry: string, date: string, holidays: string[]): string {
  const holidaysText = holidays.length > 0 ? holidays.join(", ") : NO_HOLIDAYS;

  return `
You are a marketing expert.
Today is ${date}.
Industry: ${industry}.
Holidays today: ${holidaysText}.

Suggest 2-3 marketing campaign ideas in this exact JSON format, e.g.:

[
  {
    "title": "Example title",
    "description": "Short description of the campaign."
  }
]

IMPORTANT: Return ONLY plain JSON with no comments, explanations or markdown fences (\`\`\`json).
The answer must start with [ and end with ].
`;
}
