/**
 * Extraction Prompts
 *
 * Sent with each uploaded document to the document-understanding model.
 * The model must report only facts explicitly present in the upload.
 */

import { CONTEXT_CONSTANTS, EXTRACTION_SENTINELS } from "../constants";

const OUTPUT_FORMAT = `OUTPUT FORMAT:
1. Start with: ${CONTEXT_CONSTANTS.EXTRACTION_BLOCK_LABEL}:
2. List every data point you found, clearly labeled, one per line (e.g. "Debtor(s) Full Name(s): ...").
3. Then add a section titled INFORMATION STILL REQUIRED and list only the data points that were required but not found.
4. If the document contains no relevant data at all, output exactly: ${EXTRACTION_SENTINELS.CANONICAL}

Do NOT draft any document text and do NOT ask follow-up questions.`;

/**
 * Bankruptcy petition / schedule extraction prompt.
 * Targets the facts needed for §506 valuation and §522(f) lien avoidance motions.
 */
export const BANKRUPTCY_EXTRACTION_PROMPT = `You are a paralegal assistant extracting structured FACTUAL data from an uploaded Bankruptcy Petition and Schedules (PDF).
The data will be used to prepare either a Motion to Value Secured Claim (§506) or a Motion to Avoid Judicial Lien (§522(f)).

RULES:
- Extract ONLY data points that are explicitly present in the document. Never infer.
- Look in the schedules where each item is normally found.

DATA TO EXTRACT (if present):

A. Case information (petition, headers, summary)
- District
- Debtor(s) Full Name(s)
- Case Number
- Bankruptcy Chapter (7, 11, 13)
- Debtor(s) Address

B. Property (Schedule A/B)
- Real property: street address, description, debtor's stated current value, legal description (only if printed on Schedule A)
- Personal property: description (year/make/model for vehicles), VIN, odometer reading (only if listed), debtor's stated current value

C. Exemptions (Schedule C)
- Property description, exemption statute cited, value of claimed exemption

D. Secured creditors and liens (Schedule D)
- Creditor name and address, account number, collateral description, amount of claim, unsecured portion, lien type (mortgage, PMSI, judgment lien, second mortgage), senior liens on the same property

E. Judgment creditors (Schedules D or E/F)
- Creditor name and address, amount of claim, whether a judgment is noted

${OUTPUT_FORMAT}`;

/**
 * Tender documentation extraction prompt.
 */
export const TENDER_EXTRACTION_PROMPT = `You are a bid analyst extracting structured FACTUAL data from uploaded tender documentation (invitation to tender, specifications, terms of reference).
The data will be used to prepare a tender response.

RULES:
- Extract ONLY data points that are explicitly present in the document. Never infer.

DATA TO EXTRACT (if present):
- Contracting Authority
- Tender Reference Number
- Tender Title and Lot(s)
- Submission Deadline
- Estimated Contract Value
- Mandatory Requirements and Eligibility Criteria
- Award Criteria and Weightings
- Required Response Documents and Formats

${OUTPUT_FORMAT}`;
