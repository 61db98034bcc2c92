import { z } from 'zod';

/**
 * Suggested values for the gender fields. The model is told about them but
 * the schema does not enforce them.
 */
export const GENDER_VALUES = ['Male', 'Female', 'Nonbinary', 'Two spirit', 'Other', 'Unknown'] as const;

/**
 * Suggested values for `continent_of_origin`; an island name is also allowed.
 */
export const CONTINENT_VALUES = [
    'Africa',
    'Asia',
    'Australia',
    'Europe',
    'South America',
    'North America',
    'Antarctica',
] as const;

const genderDescription = `Possible values: ${GENDER_VALUES.join('|')}`;

/**
 * Information about a single person-entity.
 */
export const PersonInfoSchema = z.object({
    birth_name: z.string().describe('Full birth name'),
    best_known_as: z.string().describe('Name by which this person is most widely known'),
    alternate_names: z
        .array(z.string())
        .describe('List of other or alternate names, such as aliases, pen names, noms de guerre, nicknames, etc.'),
    best_known_for: z
        .string()
        .describe('A one sentence description of why this person is noteworthy and what they are known for'),
    is_real: z
        .boolean()
        .describe('True iff this entity is real (as opposed to fictional, imaginary, a character in a book or movie, etc.)'),
    is_human: z
        .boolean()
        .describe('True iff this entity is a human (as opposed to, say, an animal, pet, alien, monster, imaginary being, etc.)'),
    birth_year: z
        .number()
        .int()
        .nullable()
        .describe('Year of birth (if known). Use a negative value for BCE dates; positive for CE dates.'),
    birth_month: z
        .number()
        .int()
        .nullable()
        .describe('Month of birth (if known), starting with January = 1 through December = 12.'),
    birth_day: z
        .number()
        .int()
        .nullable()
        .describe('Day of birth, within month, in the range [1, 31].'),
    assigned_gender_at_birth: z
        .string()
        .describe(`The entity's gender, as assigned at birth. ${genderDescription}`),
    gender_identity: z
        .string()
        .describe(
            `The entity's self-identified gender identity. May or may not be the same as their assigned gender at birth. ${genderDescription}`
        ),
    continent_of_origin: z
        .string()
        .nullable()
        .describe(`The continent or island on which they were born. Possible values: ${CONTINENT_VALUES.join('|')}|Island name`),
    country_of_origin: z
        .string()
        .nullable()
        .describe('The country in which they were born (if any), as that country was known at the time of their birth. Country name, or null'),
    locality_of_origin: z.string().nullable().describe('City or town or village name, or null'),
});

export type PersonInfo = z.infer<typeof PersonInfoSchema>;

/**
 * A single mention of a person's name in an article, with its relationship to
 * the article's subject and the linked URL, if any.
 */
export const NameReferenceSchema = z.object({
    name: z.string().describe("The person's name, as given in a single mention in the text of a Wikipedia article."),
    relationship: z
        .string()
        .nullable()
        .describe(
            'Relationship of this named entity to the head entity of the article. E.g., "mother", "brother", ' +
                '"employer", "opponent", etc. Multi-word relationship descriptions are acceptable when necessary ' +
                '(e.g., "brother and employee" or "third cousin, twice removed"), but prefer a single word when ' +
                "possible. If the relationship is not explicitly stated, or is unclear, don't guess - just return null."
        ),
    url: z
        .string()
        .nullable()
        .describe('The URL associated with the name mention, if one is present. null if the name is a bare mention, with no URL link.'),
});

export type NameReference = z.infer<typeof NameReferenceSchema>;

/**
 * All person names encountered in an article scan, in order of appearance.
 */
export const ArticleNamesSchema = z.object({
    names: z
        .array(NameReferenceSchema)
        .describe('List of all the names of people found in this article, with relationship and associated URL, if any.'),
});

export type ArticleNames = z.infer<typeof ArticleNamesSchema>;
