const ANALYST_PREAMBLE = "You are a business analyst with 20 years of experience.";

export const buildDiscoveryPrompt = (companyUrl: string) => `${ANALYST_PREAMBLE} You can take any company's website url, and do research about it and figure out who their competitors are.

IMPORTANT: You must respond with ONLY a valid JSON array. Do not include any explanatory text, markdown formatting, or code blocks. Return only the raw JSON array.

The output must be a JSON array where each object has this exact structure:
{
  "name": "<company name>",
  "url": "<company website URL>"
}

Company URL: ${companyUrl}

Remember: Output ONLY the JSON array, nothing else.`;

const seriesShape = (example: string, note: string) => `{
  "value": ${example},
  "year": 2023,
  "source": "https://example.com/source"
}
Note: ${note}, "year" must be a number, "source" must be a valid URL string.`;

export const buildResearchPrompt = (companyUrl: string) => `${ANALYST_PREAMBLE} You can take any company's website url, and do research about it and figure out how their networth has changed since they have started their company, how their number of users have changed since they started the business and how much funding they have made since the start of their company.

IMPORTANT: You must respond with ONLY valid JSON. Do not include any explanatory text, markdown formatting, or code blocks. Return only the raw JSON object.

The output must be a JSON object with this exact structure:

{
  "networth": [],
  "users": [],
  "funding": []
}

The "networth" array contains objects with this structure (each object must have these exact keys):
${seriesShape("1234567.89", "\"value\" must be a number in USD (normalize currency to USD if needed)")}

The "users" array contains objects with this structure (each object must have these exact keys):
${seriesShape("1000000", "\"value\" must be a number representing total users")}

The "funding" array contains objects with this structure (each object must have these exact keys):
${seriesShape("5000000.00", "\"value\" must be a number in USD representing funding amount")}

Company URL: ${companyUrl}

Remember: Output ONLY the JSON object, nothing else.`;
