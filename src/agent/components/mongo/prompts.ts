export const DATA_TYPE_MAPPING_GUIDE = `DATA TYPE MAPPING GUIDANCE:
- If field type is 'Number': Use numeric values (e.g., level: 4, age: 22)
- If field type is 'String': Use string values (e.g., name: "John Doe")
- If field type is 'Boolean': Use true/false
- If field type is 'Date': Use ISODate("YYYY-MM-DD") format
- If field type is 'ObjectId': Use ObjectId("<24 hex characters>") format`;

const MONGODB_SYNTAX_RULES = `MONGODB SYNTAX RULES:
- In $lookup stage, localField and foreignField must NOT have a $ prefix
- Field references inside $project, $group, $sort expressions use the $ prefix
- $lookup must come before any $match that references the joined data
- Boolean values are true/false, null is null (JSON literals)
- Only read stages are allowed: never $out or $merge`;

export function collectionIdentificationPrompt(userQuery: string, collections: string[]): string {
    return `
    You are an expert MongoDB database analyst. Identify which collections are needed to answer the user's question.

    Available Collections: ${collections.join(", ")}

    User Query: "${userQuery}"

    Rules:
    - Return only collection names that EXACTLY MATCH the available collections list
    - Order them by relevance, most relevant first
    - Include a relationship collection only when the question needs the join
    - Maximum of 4 collections

    Output Format:
    Return only a JSON array of collection names, for example: ["students", "departments"]
    Do not include any explanation or additional text.
    `;
}

export function mqlGenerationPrompt(targetCollection: string, schemaContext: string, userQuery: string): string {
    return `
    You are an expert MongoDB query generator. Convert the natural language request into a single MongoDB aggregation command.

    CRITICAL REQUIREMENTS:
    1. Use ONLY the collection "${targetCollection}": always write db.${targetCollection}.aggregate([...]).
    2. Preserve exact values for IDs, codes and enum values (e.g. "CRS_023" stays "CRS_023").
    3. Use case-insensitive matching for names and descriptive text: {"field": {"$regex": "value", "$options": "i"}}.
    4. Include filters for active / non-deleted records when the schema has such fields (status, is_active, deleted).
    5. READ-ONLY: never generate insert, update, delete, $out or $merge.
    6. Minimal projection: only project fields the user asked for or that are needed to answer; use "_id": 0 unless IDs are requested.
    7. Place $lookup (and $unwind) stages before any $match on joined fields.
    8. "first/earliest/oldest" → $sort ascending + $limit 1; "last/latest/newest" → $sort descending + $limit 1; "how many/count/total" → $count.
    9. Use double quotes for all keys and strings and JSON literals true/false/null.

    ${MONGODB_SYNTAX_RULES}

    Examples:
    Input: "How many departments do we have?"
    db.departments.aggregate([{"$count": "total"}])

    Input: "Show me student names enrolled in course CRS_023"
    db.students.aggregate([{"$lookup": {"from": "enrollments", "localField": "student_id", "foreignField": "student_id", "as": "enrollments_info"}}, {"$unwind": "$enrollments_info"}, {"$match": {"enrollments_info.course_id": "CRS_023"}}, {"$project": {"name": 1, "_id": 0}}])

    Schema Context:
    Target Collection: ${targetCollection}
    ${schemaContext || "No schema information available"}

    Input: ${userQuery}

    Return ONLY the single command starting with db.${targetCollection}.aggregate(). No explanations, no code fences.
    `;
}

export function queryCheckPrompt(query: string, userQuery: string, schemaContext: string): string {
    return `
    Analyze the MongoDB query and decide if it has ACTUAL ISSUES that need fixing.

    User Query: "${userQuery}"
    Generated MongoDB Query: ${query}
    Schema Context: ${schemaContext}

    Respond "YES" ONLY for actual problems:
    1. Syntax errors (invalid syntax, wrong operators, malformed JSON)
    2. Field names that do not exist in the schema
    3. Wrong data types (string values for Number fields or vice versa)
    4. $lookup localField/foreignField written with a $ prefix
    5. Logic that does not answer the user's request

    Do NOT flag correct but complex queries.
    Give only YES or NO as the answer.
    `;
}

export function queryAnalysisPrompt(query: string, userQuery: string, schemaContext: string): string {
    return `
    Analyze the MongoDB query for issues and fix it.

    User Query: "${userQuery}"
    MongoDB Query: ${query}
    Schema Context: ${schemaContext}

    ${DATA_TYPE_MAPPING_GUIDE}

    ${MONGODB_SYNTAX_RULES}

    Check for syntax issues, field name mismatches, truncated ObjectIds (must be 24 hex characters),
    data type mismatches and logic errors. A fixed query must be a single command starting with db.<collection>.aggregate(.

    RESPONSE FORMAT (JSON ONLY):
    {
        "has_issues": true | false,
        "issues": "description of issues found",
        "fixed_query": "corrected query if issues found, or null"
    }
    `;
}

export function queryFixPrompt(query: string, userQuery: string, schemaContext: string): string {
    return `
    The following MongoDB query ran without errors but returned NO results.

    User Query: "${userQuery}"
    MongoDB Query: ${query}
    Schema Context: ${schemaContext}

    ${DATA_TYPE_MAPPING_GUIDE}

    Common causes: exact matching where a case-insensitive $regex is needed, string values for Number fields,
    filters on fields that do not exist, over-restrictive status filters, $match on joined fields before the $lookup.

    Return ONLY the corrected single command starting with db.<collection>.aggregate(). No explanations, no code fences.
    `;
}

export function formatAnswerPrompt(userQuery: string, queryResult: string): string {
    return `
    You are a helpful assistant that converts database query results into natural language answers.

    User's Original Question: "${userQuery}"

    Database Query Result:
    ${queryResult}

    Instructions:
    1. Provide a clear, concise answer to the user's question
    2. If the result is a number, state it clearly with context
    3. If the result is a list, format it nicely (use bullets if more than 3 items)
    4. If the result is empty, explain that no data was found
    5. Don't mention technical details about MongoDB or the query

    Provide only the natural language answer:
    `;
}
