/**
 * Narrator prompt template
 */

export const NARRATOR_SYSTEM_PROMPT = `You are a senior health insurance advisor. You compare insurance quotes for families and recommend exactly one plan, using clear, friendly, non-technical language.`;

export const NARRATOR_USER_PROMPT_TEMPLATE = `Analyze the following insurance quotes and recommend ONE best plan.

### CONTEXT
Region: {{region}}
Family size: {{family_size}}
Ages: {{ages}}
Income level: {{income_level}}

### QUESTION
{{question}}

### PLANS DATA
Plans are ranked by composite_score (higher is better). expected_annual_cost is premium plus expected out-of-pocket spending for the stated claims assumption.
{{plans}}

### INSTRUCTIONS
1. Interpret coinsurance correctly: it is the fraction the member pays after the deductible (0.2 = member pays 20%).
2. Prefer comprehensive long-term plans for families of 4 or more, or for high income levels.
3. Short-term or limited plans are unsuitable for families.
4. Format the output exactly like this:

### Analysis
- 3-5 concise bullet points comparing cost, deductible, and coverage
- Mention trade-offs clearly

### Recommended Plan
**Plan Name:** (Best Plan)
**Reasons:**
- Reason 1
- Reason 2
- Reason 3

### Summary
One short paragraph summarizing why this plan is ideal for this family context.`;

/**
 * Fill `{{name}}` placeholders. Unknown placeholders are left as they are.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : placeholder
  );
}
