import type { ReferenceNote } from "./types";

export interface ItineraryPromptParams {
  destination: string;
  days: number;
  /** YYYY-MM-DD */
  startDate: string;
  interests: string[];
  foodPreferences: string[];
  travelers: string;
  budgetMin: number;
  budgetMax: number;
  referenceNotes?: ReferenceNote[];
}

const NO_PREFERENCE = "无特殊偏好";

function joinTags(tags: string[]): string {
  const cleaned = tags.map((t) => t.trim()).filter(Boolean);
  return cleaned.length > 0 ? cleaned.join("、") : NO_PREFERENCE;
}

export function formatReferenceNotes(notes: ReferenceNote[]): string {
  return notes
    .map((note) => {
      const tags = note.tags.length > 0 ? `\n标签：${note.tags.join("、")}` : "";
      return `笔记：${note.title}\n${note.content}${tags}`;
    })
    .join("\n\n");
}

function buildReferenceBlock(notes: ReferenceNote[] | undefined): string {
  if (!notes || notes.length === 0) return "";

  return `【优先参考】以下是用户提供的参考笔记，请优先选用其中推荐的景点、餐厅和路线，笔记未覆盖的部分再自行补充：
${formatReferenceNotes(notes)}
【优先参考结束】

`;
}

function buildFormatExample(startDate: string): string {
  return `{
    "day_1": {
        "date": "${startDate}",
        "theme": "主题描述",
        "schedule": {
            "morning": [
                {
                    "type": "spot",
                    "name": "景点名称",
                    "description": "景点简介/看点",
                    "play_time_minutes": 90,
                    "recommended_time": "建议游览时间（例如 1-2小时）",
                    "ticket_price": "门票价格（例如 60元 或 免费）",
                    "notes": ["注意事项1", "注意事项2"]
                },
                {
                    "type": "spot",
                    "name": "第二个景点名称",
                    "description": "景点简介/看点",
                    "play_time_minutes": 60,
                    "notes": [],
                    "commute_from_prev": {
                        "mode": "步行/地铁/公交/打车",
                        "duration_minutes": 15,
                        "transfers": 0,
                        "details": "是否换乘、建议线路/站点等提示"
                    }
                }
            ],
            "afternoon": [
                {
                    "type": "restaurant",
                    "name": "餐厅名称",
                    "cuisine": "菜系",
                    "description": "餐厅特色与推荐菜",
                    "price_range": "人均价格（例如 人均80-120）",
                    "play_time_minutes": 60,
                    "notes": ["注意事项（例如需排队/预约）"]
                }
            ],
            "evening": []
        },
        "tips": "当日旅行小贴士"
    },
    "day_2": {...},
    ...
}`;
}

/**
 * Build the itinerary-generation prompt. Pure: same params, same text.
 */
export function buildItineraryPrompt(params: ItineraryPromptParams): string {
  const { destination, days, startDate, travelers, budgetMin, budgetMax } = params;
  const dayKeys = days === 1 ? "day_1" : `day_1 到 day_${days}`;

  return `你是一位专业的旅行规划师。请为以下旅行需求生成详细的${days}天旅行路线规划。

目的地：${destination}
出发日期：${startDate}
旅行天数：${days}天
出行人员：${travelers || "未说明"}
旅行偏好：${joinTags(params.interests)}
饮食偏好：${joinTags(params.foodPreferences)}
预算范围：${budgetMin} - ${budgetMax} 元

${buildReferenceBlock(params.referenceNotes)}请按照以下JSON格式返回路线规划，顶层键为 ${dayKeys}（重点：按早/中/晚分段，并给出“点到点通勤”细节、游玩时长、注意事项）：
${buildFormatExample(startDate)}

要求：
1. 每天安排3-5个主要活动，必须覆盖全部 ${days} 天
2. 每个活动都要有 type（spot 或 restaurant）、name、description、play_time_minutes（分钟）
3. 对每个活动尽量给出 notes（注意事项），没有则给空数组 []
4. 对 morning/afternoon/evening 每个列表中，从第二个点开始给出 commute_from_prev（通勤方式/耗时/换乘次数/提示）
5. 考虑交通便利性和时间合理性，确保路线连贯，避免重复
6. 结合用户的旅行偏好和饮食偏好，控制预算在指定范围内
7. 不要输出除 JSON 外的任何文字，不要使用 Markdown 代码块

请直接返回JSON格式，不要包含其他文字说明。`;
}
