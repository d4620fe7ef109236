import { z } from "zod";
import { parseAmount } from "@/lib/invoices/amounts";

// null, "" and whitespace collapse to null; numbers are kept as text
const optText = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((v) => (v == null ? null : String(v).trim() || null));

const requiredText = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .pipe(z.string().min(1, "must not be empty"));

const optAmount = z
  .union([z.number(), z.string(), z.null(), z.undefined()])
  .transform((v) => parseAmount(v));

const requiredAmount = z.union([z.number(), z.string()]).transform((v, ctx) => {
  const parsed = parseAmount(v);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${v}" is not an amount` });
    return z.NEVER;
  }
  return parsed;
});

export const aiInvoiceHeaderSchema = z.object({
  vendor_name: requiredText,
  vendor_tax_id: optText,
  invoice_number: requiredText,
  invoice_date: optText,
  due_date: optText,
  currency: optText.transform((v) => (v ? v.toUpperCase() : null)),
  net_amount: optAmount,
  tax_amount: optAmount,
  total_amount: requiredAmount,
  payment_terms: optText,
});

export const aiLineItemSchema = z.object({
  description: optText,
  quantity: optAmount,
  unit_price: optAmount,
  line_total: optAmount,
});

/**
 * Shape the structuring prompt asks the model to return.
 */
export const aiInvoiceResponseSchema = z.object({
  invoice: aiInvoiceHeaderSchema,
  line_items: z.array(aiLineItemSchema).nullish().transform((v) => v ?? []),
});

export type AiInvoiceResponse = z.infer<typeof aiInvoiceResponseSchema>;
export type AiLineItem = z.infer<typeof aiLineItemSchema>;
