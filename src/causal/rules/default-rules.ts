import type { BioRule } from './types.js';

/** Built-in rules used during cold start and when iterative reasoning is inconclusive. */
export const DEFAULT_RULES: readonly BioRule[] = [
    {
        id: 'metabolic_crash_fatigue',
        name: 'Glucose Crash Fatigue',
        conditions: [
            { check: 'glucose_crash_delta', threshold: 40 },
            { check: 'hrv_drop_percent', threshold: 15 },
        ],
        conclusion: 'metabolic',
        explanation: 'Post-meal glucose crash with HRV suppression indicates metabolic fatigue.',
        recommendation: 'Add protein or fat before carbs to flatten the glucose curve.',
        confidence: 0.75,
    },
    {
        id: 'low_protein_recovery',
        name: 'Low Protein Recovery Deficit',
        conditions: [
            { check: 'hrv_below', threshold: 40 },
            { check: 'protein_below', grams: 20 },
        ],
        conclusion: 'metabolic',
        explanation: 'Low HRV combined with insufficient protein intake impairs recovery.',
        recommendation: 'Include 20-30g protein in your next meal for recovery support.',
        confidence: 0.70,
    },
    {
        id: 'digital_dopamine_debt',
        name: 'Dopamine Debt Fatigue',
        conditions: [
            { check: 'dopamine_debt_above', threshold: 60 },
            { check: 'passive_minutes_above', threshold: 40 },
        ],
        conclusion: 'digital',
        explanation: 'Extended passive screen time has depleted dopamine reserves.',
        recommendation: 'Take a 10-minute walk or engage in a focus-mode work block.',
        confidence: 0.70,
    },
    {
        id: 'late_meal_sleep',
        name: 'Late Meal Sleep Impact',
        conditions: [
            { check: 'late_meal_after', hour: 21 },
            { check: 'gl_above', threshold: 30 },
        ],
        conclusion: 'metabolic',
        explanation: 'High-GL meal after 9 PM disrupts sleep architecture.',
        recommendation: 'Eat dinner at least 2 hours before bed, keeping GL below 25.',
        confidence: 0.72,
    },
    {
        id: 'aqi_stress',
        name: 'Air Quality Stress',
        conditions: [
            { check: 'aqi_above', threshold: 100 },
            { check: 'hrv_drop_percent', threshold: 10 },
        ],
        conclusion: 'somatic',
        explanation: 'Poor air quality is causing oxidative stress and HRV suppression.',
        recommendation: 'Stay indoors and use an air purifier when AQI exceeds 100.',
        confidence: 0.65,
    },
    {
        id: 'sleep_deprivation',
        name: 'Sleep Deprivation',
        conditions: [
            { check: 'sleep_below', hours: 6.5 },
            { check: 'hrv_below', threshold: 45 },
        ],
        conclusion: 'somatic',
        explanation: 'Insufficient sleep combined with low HRV indicates recovery deficit.',
        recommendation: 'Prioritize 7.5+ hours tonight. Avoid screens 1 hour before bed.',
        confidence: 0.75,
    },
    {
        // The crash explains the scrolling, so the conclusion is metabolic.
        id: 'reactive_scrolling',
        name: 'Reactive Scrolling Pattern',
        conditions: [
            { check: 'glucose_crash_delta', threshold: 30 },
            { check: 'passive_minutes_above', threshold: 20 },
        ],
        conclusion: 'metabolic',
        explanation: 'Zombie scrolling occurred after a glucose crash: the fatigue caused the scrolling, not the other way around.',
        recommendation: 'Address the glucose crash with better meal composition. The scrolling will resolve.',
        confidence: 0.70,
    },
    {
        id: 'pollen_fatigue',
        name: 'Pollen Sensitivity Fatigue',
        conditions: [
            { check: 'pollen_above', threshold: 8 },
            { check: 'sleep_below', hours: 7.0 },
        ],
        conclusion: 'somatic',
        explanation: 'High pollen is triggering a histamine response, disrupting sleep and causing fatigue.',
        recommendation: 'Consider an antihistamine and keep windows closed on high-pollen days.',
        confidence: 0.60,
    },
    {
        id: 'chronic_high_gl',
        name: 'Chronic High Glycemic Load',
        conditions: [{ check: 'gl_above', threshold: 35 }],
        conclusion: 'metabolic',
        explanation: 'Consistently high glycemic load meals are driving glucose volatility.',
        recommendation: 'Aim for GL below 25 per meal. Switch to whole grains and add protein/fat.',
        confidence: 0.68,
    },
];
