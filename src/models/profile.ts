import { z } from 'zod'

export const DateRangeSchema = z.object({
  /** ISO date (YYYY-MM-DD), first of the month */
  start: z.string().nullable(),
  end: z.string().nullable(),
  isCurrent: z.boolean(),
})

export type DateRange = z.infer<typeof DateRangeSchema>

export const YearRangeSchema = z.object({
  start: z.number().int().nullable(),
  end: z.number().int().nullable(),
  isCurrent: z.boolean(),
})

export type YearRange = z.infer<typeof YearRangeSchema>

export const ExperienceSchema = z.object({
  title: z.string().nullable(),
  company: z.string().nullable(),
  companyId: z.string().nullable(),
  companyUrl: z.string().nullable(),
  companyLogo: z.string().nullable(),
  startDate: z.string().nullable(),
  endDate: z.string().nullable(),
  isCurrent: z.boolean().default(false),
  location: z.string().nullable(),
  description: z.string().nullable(),
  skills: z.array(z.string()).default([]),
})

export type Experience = z.infer<typeof ExperienceSchema>

export const EducationSchema = z.object({
  school: z.string().nullable(),
  schoolId: z.string().nullable(),
  schoolUrl: z.string().nullable(),
  schoolLogo: z.string().nullable(),
  degree: z.string().nullable(),
  fieldOfStudy: z.string().nullable(),
  startYear: z.number().int().nullable(),
  endYear: z.number().int().nullable(),
  description: z.string().nullable(),
})

export type Education = z.infer<typeof EducationSchema>

export const SkillSchema = z.object({
  name: z.string(),
  entityUrn: z.string().nullable(),
  endorsementCount: z.number().int().nonnegative().default(0),
  endorsedByViewer: z.boolean().default(false),
})

export type Skill = z.infer<typeof SkillSchema>

/**
 * Wraps decoded experiences the way API consumers expect them
 */
export function formatExperienceForOutput(experiences: Experience[]): {
  workExperience: Experience[]
} {
  return { workExperience: experiences }
}

export function formatEducationForOutput(educations: Education[]): {
  education: Education[]
} {
  return { education: educations }
}

export function experienceToString(experience: Experience): string {
  const end = experience.isCurrent ? 'Present' : experience.endDate
  return (
    `<Experience ${experience.title}\n` +
    `  Company: ${experience.company}\n` +
    `  Dates: ${experience.startDate} - ${end}\n` +
    `  Location: ${experience.location}\n` +
    `  Skills: ${experience.skills.length}>`
  )
}
