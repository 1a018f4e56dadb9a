/**
 * Normalize an entity name for identity matching.
 *
 * - Strips a package-local prefix: "cardio: Blood Test", "cardio - Blood Test"
 * - Strips bracketed qualifiers: "Blood Test (Cardiology)", "Blood Test [v2]"
 * - Folds case, and treats runs of whitespace, "_" and "-" as one space
 *
 * "Cardio: Blood_Test (ER)" → "blood test"
 */
export function normalizeName(name: string, packageTag?: string): string {
    let value = name.trim();

    if (packageTag) {
        const prefix = new RegExp(`^${escapeRegExp(packageTag)}\\s*(?::|\\s-)\\s*`, 'i');
        value = value.replace(prefix, '');
    }

    value = value.replace(/\s*[([{][^)\]}]*[)\]}]\s*/g, ' ');

    return value
        .toLowerCase()
        .replace(/[\s_-]+/g, ' ')
        .trim();
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
